import type { AccelerometerSample, AgentRecord, ProcessedRecord, RoadState } from "./types.js";

type Interval = {
  start: number;
  end: number;
};

const NORMAL: Interval = { start: 14000, end: 18000 };
const SMALL_PITS_BELOW: Interval = { start: 12000, end: 14000 };
const SMALL_PITS_ABOVE: Interval = { start: 18000, end: 20000 };

function openInterval(value: number, interval: Interval): boolean {
  return interval.start < value && value < interval.end;
}

/**
 * Labels the road surface from the vertical acceleration.
 * The normal band is open at 14000 and closed at 18000; both small-pit bands are open.
 * Anything else, NaN included, is large_pits.
 */
export function classifyRoadState(sample: Pick<AccelerometerSample, "z">): RoadState {
  const { z } = sample;
  if (NORMAL.start < z && z <= NORMAL.end) return "normal";
  if (openInterval(z, SMALL_PITS_BELOW) || openInterval(z, SMALL_PITS_ABOVE)) return "small_pits";
  return "large_pits";
}

export function processAgentRecord(agentData: AgentRecord): ProcessedRecord {
  return Object.freeze({
    roadState: classifyRoadState(agentData.accelerometer),
    agentData
  });
}
