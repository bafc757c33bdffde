export type EngineErrorCode =
  | 'INVALID_CANDIDATE'
  | 'INVALID_SCENARIO'
  | 'CAPACITY_EXCEEDED'
  | 'DUPLICATE_POSITION'
  | 'UNKNOWN_POSITION'
  | 'DUPLICATE_DECISION'
  | 'MALFORMED_JUDGMENT';

/**
 * Base class for every rejection the engine raises. All of them are recoverable
 * by the caller: one failing ticker never stops the rest of a cycle.
 */
export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(
    message: string,
    readonly ticker: string | null,
    readonly cycleId: string | null = null,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCandidate extends EngineError {
  readonly code = 'INVALID_CANDIDATE';
}

export class InvalidScenario extends EngineError {
  readonly code = 'INVALID_SCENARIO';
}

export class CapacityExceeded extends EngineError {
  readonly code = 'CAPACITY_EXCEEDED';

  constructor(ticker: string, readonly openCount: number, readonly capacity: number) {
    super(`No free slot for ${ticker}: ${openCount}/${capacity} positions open`, ticker);
  }
}

export class DuplicatePosition extends EngineError {
  readonly code = 'DUPLICATE_POSITION';

  constructor(ticker: string) {
    super(`Position already open for ${ticker}`, ticker);
  }
}

export class UnknownPosition extends EngineError {
  readonly code = 'UNKNOWN_POSITION';

  constructor(ticker: string, cycleId: string | null = null) {
    super(`No open position for ${ticker}`, ticker, cycleId);
  }
}

export class DuplicateDecision extends EngineError {
  readonly code = 'DUPLICATE_DECISION';

  constructor(ticker: string, cycleId: string) {
    super(`Decision already recorded for ${ticker} in cycle ${cycleId}`, ticker, cycleId);
  }
}

export class MalformedJudgment extends EngineError {
  readonly code = 'MALFORMED_JUDGMENT';

  constructor(ticker: string, cycleId: string, readonly issues: string[]) {
    super(`Malformed judgment for ${ticker}: ${issues.join('; ')}`, ticker, cycleId);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
