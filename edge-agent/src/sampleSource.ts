import fs from "node:fs";
import { parse } from "csv-parse";
import { z } from "zod";
import type { AccelerometerSample, AgentRecord, GpsSample } from "./types.js";

/** A sequence that never ends: reaching the last item starts over from the first. */
export interface RestartableSequence<T> {
  next(): T;
}

export interface SampleSource extends RestartableSequence<AgentRecord> {
  start(): Promise<void>;
  stop(): void;
}

export const AccelerometerRow = z.object({
  x: z.coerce.number().finite(),
  y: z.coerce.number().finite(),
  z: z.coerce.number().finite()
});

export const GpsRow = z.object({
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180)
});

export class SampleParseError extends Error {
  constructor(readonly filePath: string, readonly line: number, message: string) {
    super(`${filePath}:${line}: ${message}`);
    Object.setPrototypeOf(this, SampleParseError.prototype);
  }
}

export type CsvRow = {
  /** 1-based line of the source file the row ends on. */
  line: number;
  row: Record<string, string>;
};

const ParsedEntry = z.object({
  record: z.record(z.string()),
  info: z.object({ lines: z.number().int() }),
});

function lineOf(err: unknown): number {
  return typeof err === "object" && err !== null && "lines" in err && typeof err.lines === "number" ? err.lines : 1;
}

/** Reads a header-led CSV file into one object per data row, keyed by lower-cased column name. */
export function readCsv(filePath: string): Promise<CsvRow[]> {
  return new Promise((resolve, reject) => {
    const rows: CsvRow[] = [];
    const parser = parse({
      columns: (header: string[]) => header.map((name) => name.toLowerCase()),
      trim: true,
      skip_empty_lines: true,
      info: true,
    });

    parser
      .on("data", (data: unknown) => {
        const entry = ParsedEntry.safeParse(data);
        if (!entry.success) {
          parser.destroy(new SampleParseError(filePath, 1, "unexpected parser output"));
          return;
        }
        rows.push({ line: entry.data.info.lines, row: entry.data.record });
      })
      .on("end", () => {
        resolve(rows);
      })
      .on("error", (error) => {
        reject(error instanceof SampleParseError ? error : new SampleParseError(filePath, lineOf(error), error.message));
      });

    fs.createReadStream(filePath)
      .on("error", reject)
      .pipe(parser);
  });
}

export class CsvSequence<T> implements RestartableSequence<T> {
  private rows: T[] = [];
  private cursor = 0;

  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  async open(): Promise<void> {
    const parsed: T[] = [];
    for (const { line, row } of await readCsv(this.filePath)) {
      const result = this.schema.safeParse(row);
      if (!result.success) {
        const issue = result.error.issues[0];
        throw new SampleParseError(this.filePath, line, `${issue.path.join(".") || "row"}: ${issue.message}`);
      }
      parsed.push(result.data);
    }
    if (!parsed.length) {
      throw new SampleParseError(this.filePath, 1, "no data rows");
    }
    this.rows = parsed;
    this.cursor = 0;
  }

  next(): T {
    if (!this.rows.length) {
      throw new Error(`${this.filePath} is not open`);
    }
    if (this.cursor >= this.rows.length) {
      this.cursor = 0;
    }
    const row = this.rows[this.cursor];
    this.cursor += 1;
    return row;
  }

  close(): void {
    this.rows = [];
    this.cursor = 0;
  }
}

export type FileDatasourceOptions = {
  accelerometerFile: string;
  gpsFile: string;
  userId: number;
  now?: () => Date;
};

/** Replays accelerometer and GPS files side by side, stamping each pair at read time. */
export class FileDatasource implements SampleSource {
  private readonly accelerometer: CsvSequence<AccelerometerSample>;
  private readonly gps: CsvSequence<GpsSample>;
  private readonly userId: number;
  private readonly now: () => Date;

  constructor(options: FileDatasourceOptions) {
    this.accelerometer = new CsvSequence(options.accelerometerFile, AccelerometerRow);
    this.gps = new CsvSequence(options.gpsFile, GpsRow);
    this.userId = options.userId;
    this.now = options.now ?? (() => new Date());
  }

  async start(): Promise<void> {
    await Promise.all([this.accelerometer.open(), this.gps.open()]);
  }

  next(): AgentRecord {
    const accelerometer = Object.freeze(this.accelerometer.next());
    const gps = Object.freeze(this.gps.next());
    return Object.freeze({
      userId: this.userId,
      accelerometer,
      gps,
      timestamp: this.now()
    });
  }

  stop(): void {
    this.accelerometer.close();
    this.gps.close();
  }
}
