import { z } from "zod";

export const MAX_LOOKBACK_HOURS = 168;

const hoursSchema = z.coerce
  .number({ invalid_type_error: "hours must be a number" })
  .int("hours must be an integer")
  .min(1, "hours must be at least 1")
  .max(MAX_LOOKBACK_HOURS, `hours must be at most ${MAX_LOOKBACK_HOURS}`)
  .default(1);

export const incidentQuerySchema = z.object({
  hours: hoursSchema,
});

export const serviceErrorsParamsSchema = z.object({
  service: z.string().min(1, "Service name is required").max(100),
});

export type IncidentQuery = z.infer<typeof incidentQuerySchema>;
