export type JourneyErrorCode =
  | 'INVALID_TRANSITION'
  | 'UNKNOWN_CHECKPOINT'
  | 'INVALID_CHECKPOINT_VALUE'
  | 'EXTRACTION_UNAVAILABLE'
  | 'GENERATION_FAILURE'
  | 'JOURNEY_NOT_FOUND'
  | 'USER_NOT_FOUND'
  | 'NO_PENDING_TURN';

export abstract class JourneyEngineError extends Error {
  abstract readonly code: JourneyErrorCode;
}

/** An advance/complete (or write) whose preconditions do not hold. */
export class InvalidTransition extends JourneyEngineError {
  override name = 'InvalidTransition' as const;
  readonly code = 'INVALID_TRANSITION' as const;

  constructor(
    message: string,
    readonly journeyId?: number,
  ) {
    super(message);
  }
}

export class UnknownCheckpoint extends JourneyEngineError {
  override name = 'UnknownCheckpoint' as const;
  readonly code = 'UNKNOWN_CHECKPOINT' as const;

  constructor(readonly checkpointName: string) {
    super(`Unknown checkpoint: "${checkpointName}"`);
  }
}

export class InvalidCheckpointValue extends JourneyEngineError {
  override name = 'InvalidCheckpointValue' as const;
  readonly code = 'INVALID_CHECKPOINT_VALUE' as const;

  constructor(
    readonly checkpointName: string,
    readonly value: string,
    readonly allowed: readonly string[],
  ) {
    super(
      `Value "${value}" is not valid for checkpoint "${checkpointName}" (allowed: ${allowed.join(', ')})`,
    );
  }
}

/** Raised by extraction capabilities; the Sentinel recovers from it locally. */
export class ExtractionUnavailable extends JourneyEngineError {
  override name = 'ExtractionUnavailable' as const;
  readonly code = 'EXTRACTION_UNAVAILABLE' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The generation capability failed for a turn. The user message identified by
 * `userMessageId` stays persisted so the turn can be retried without resending it.
 */
export class GenerationFailure extends JourneyEngineError {
  override name = 'GenerationFailure' as const;
  readonly code = 'GENERATION_FAILURE' as const;

  constructor(
    message: string,
    readonly journeyId: number,
    readonly userMessageId: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class JourneyNotFound extends JourneyEngineError {
  override name = 'JourneyNotFound' as const;
  readonly code = 'JOURNEY_NOT_FOUND' as const;

  constructor(readonly journeyId: number) {
    super(`Journey ${journeyId} not found`);
  }
}

export class UserNotFound extends JourneyEngineError {
  override name = 'UserNotFound' as const;
  readonly code = 'USER_NOT_FOUND' as const;

  constructor(readonly userId: number) {
    super(`User ${userId} not found`);
  }
}

export class NoPendingTurn extends JourneyEngineError {
  override name = 'NoPendingTurn' as const;
  readonly code = 'NO_PENDING_TURN' as const;

  constructor(readonly journeyId: number) {
    super(`Journey ${journeyId} has no unanswered user message to retry`);
  }
}
