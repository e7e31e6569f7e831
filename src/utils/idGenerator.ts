import { createHash } from "crypto";
import { v4 as uuidv4 } from "uuid";

export const generateCorrelationId = (): string => {
  return `req-${uuidv4()}`;
};

export const generateConnectionId = (): string => {
  return `conn-${uuidv4()}`;
};

interface IncidentKey {
  service: string;
  level: string;
  timestamp: Date;
  message: string;
}

/**
 * Deterministic incident id: the same log row always hashes to the same id,
 * which is what lets consumers drop re-detections.
 */
export const generateIncidentId = (entry: IncidentKey): string => {
  const rounded = new Date(Math.floor(entry.timestamp.getTime() / 1000) * 1000);
  const key = [
    entry.service || "unknown",
    entry.level.toUpperCase(),
    rounded.toISOString(),
    entry.message.slice(0, 50),
  ].join("_");

  return createHash("md5").update(key).digest("hex").slice(0, 16);
};
