export class SamplerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class OutOfOrderError extends SamplerError {
  readonly monotonicTime: number;
  readonly lastTime: number;

  constructor(monotonicTime: number, lastTime: number) {
    super(`Snapshot at ${monotonicTime}s does not follow the latest stored snapshot at ${lastTime}s`);
    this.monotonicTime = monotonicTime;
    this.lastTime = lastTime;
  }
}

export class InvalidSnapshotError extends SamplerError {}

export class EmptyHistoryError extends SamplerError {
  constructor() {
    super("No data yet");
  }
}

export class SourceUnavailableError extends SamplerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}
