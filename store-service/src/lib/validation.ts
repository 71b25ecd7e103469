import { ROAD_STATES } from "@roadwatch/types";
import { z } from "zod";

export const AccelerometerPayload = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite()
});

export const GpsPayload = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180)
});

export const AgentDataPayload = z.object({
  user_id: z.number().int().nonnegative(),
  accelerometer: AccelerometerPayload,
  gps: GpsPayload,
  // ISO-8601 with "Z" or an explicit offset; naive local times are rejected.
  timestamp: z.string()
    .datetime({ offset: true })
    .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid datetime")
});

export const ProcessedAgentDataPayload = z.object({
  road_state: z.enum(ROAD_STATES),
  agent_data: AgentDataPayload
});
export type ProcessedAgentDataPayload = z.infer<typeof ProcessedAgentDataPayload>;

export const RecordId = z.coerce.number().int().positive();
export const UserId = z.coerce.number().int().nonnegative();

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "value"}: ${issue.message}`)
    .join("; ");
}
