export const CHANNELS = {
  HEALTH_UPDATES: process.env.REDIS_CHANNEL_HEALTH || "service_health",
  INCIDENTS: process.env.REDIS_CHANNEL_INCIDENTS || "incidents",
  ANALYTICS_UPDATES: process.env.REDIS_CHANNEL_ANALYTICS || "analytics_updates",
  ERROR_LOGS: process.env.REDIS_CHANNEL_ERRORS || "error_logs",
} as const;

export const MESSAGE_TYPES = {
  HEALTH_UPDATE: "health_update",
  INCIDENT_DETECTED: "incident_detected",
  ANALYTICS_UPDATE: "analytics_update",
  ERROR_LOG: "error_log",
} as const;
