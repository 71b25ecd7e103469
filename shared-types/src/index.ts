export const ROAD_STATES = ["normal", "small_pits", "large_pits"] as const;
export type RoadState = typeof ROAD_STATES[number];

export type AccelerometerSample = {
  x: number;
  y: number;
  z: number;
};

export type GpsSample = {
  latitude: number;
  longitude: number;
};

/** Agent sample as it travels on the wire: timestamp is an ISO-8601 string with zone. */
export type AgentDataPayload = {
  user_id: number;
  accelerometer: AccelerometerSample;
  gps: GpsSample;
  timestamp: string;
};

export type ProcessedAgentDataPayload = {
  road_state: RoadState;
  agent_data: AgentDataPayload;
};

/** Flattened row returned by the store service and pushed to subscribers. */
export type StoredRecord = {
  id: number;
  road_state: RoadState;
  user_id: number;
  x: number;
  y: number;
  z: number;
  latitude: number;
  longitude: number;
  timestamp: string;
};

export type IngestResult = {
  accepted: true;
  ids: number[];
};
