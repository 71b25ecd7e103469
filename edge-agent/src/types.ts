import type { AccelerometerSample, GpsSample, RoadState } from "@roadwatch/types";

export type { AccelerometerSample, GpsSample, RoadState };

export type AgentRecord = Readonly<{
  userId: number;
  accelerometer: Readonly<AccelerometerSample>;
  gps: Readonly<GpsSample>;
  timestamp: Date;
}>;

export type ProcessedRecord = Readonly<{
  roadState: RoadState;
  agentData: AgentRecord;
}>;
