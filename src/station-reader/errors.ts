/**
 * Parse failures. Every error names the offending line when one is at fault.
 */

export type StationRecordErrorCode = "MalformedHeader" | "MalformedRow" | "EmptyDataset";

export interface LineLocation {
  /** 1-based */
  lineNumber: number;
  line: string;
}

export class StationRecordError extends Error {
  readonly code: StationRecordErrorCode;
  readonly reason: string;
  readonly lineNumber?: number;
  readonly line?: string;

  constructor(code: StationRecordErrorCode, reason: string, location?: LineLocation) {
    super(
      location
        ? `${code} at line ${location.lineNumber}: ${reason} [${location.line.trim()}]`
        : `${code}: ${reason}`
    );
    this.name = new.target.name;
    this.code = code;
    this.reason = reason;
    this.lineNumber = location?.lineNumber;
    this.line = location?.line;
  }

  toJSON(): { code: StationRecordErrorCode; reason: string; lineNumber?: number; line?: string } {
    return { code: this.code, reason: this.reason, lineNumber: this.lineNumber, line: this.line };
  }
}

export class MalformedHeaderError extends StationRecordError {
  constructor(reason: string, location?: LineLocation) {
    super("MalformedHeader", reason, location);
  }
}

export class MalformedRowError extends StationRecordError {
  constructor(reason: string, location: LineLocation) {
    super("MalformedRow", reason, location);
  }
}

export class EmptyDatasetError extends StationRecordError {
  constructor(reason: string) {
    super("EmptyDataset", reason);
  }
}

export function isStationRecordError(err: unknown): err is StationRecordError {
  return err instanceof StationRecordError;
}
