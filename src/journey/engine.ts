import {
  EXTRACTION_TIMEOUT,
  GENERATION_ACTIONS_ENABLED,
  GENERATION_TIMEOUT,
  GENERATION_WINDOW,
  KEYWORD_FALLBACK_ENABLED,
  SENTINEL_WINDOW,
} from '../config.js';
import {
  GenerationFailure,
  InvalidCheckpointValue,
  InvalidTransition,
  JourneyNotFound,
  NoPendingTurn,
  UserNotFound,
} from '../errors.js';
import type {
  ConversationTurn,
  ExtractionCapability,
  FunctionCall,
  GenerationCapability,
  GenerationResult,
} from '../llm/capabilities.js';
import { runWithTimeout } from '../llm/timeout.js';
import { logger } from '../logger.js';
import type { Journey, JourneyStatus, JourneyStore, Message, User } from '../types.js';
import {
  ADVANCE_MILESTONE,
  COMPLETE_JOURNEY,
  REMEMBER_USER_ATTRIBUTE,
  RememberAttributeArgs,
  generationActions,
} from './actions.js';
import { applyCheckpointValue, normalizeCheckpointValue } from './checkpoints.js';
import { JourneyLock } from './journey-lock.js';
import type { MilestoneModel } from './milestone-model.js';
import { renderPrompt, selectTemplate, type TemplateId } from './prompts.js';
import { Sentinel, type SentinelOutcome } from './sentinel.js';
import {
  advance,
  complete,
  completedCheckpoints,
  isMilestoneComplete,
} from './state-machine.js';

export interface JourneyEngineOptions {
  sentinelWindow: number;
  generationWindow: number;
  extractionTimeoutMs: number;
  generationTimeoutMs: number;
  keywordFallback: boolean;
  actionsEnabled: boolean;
}

export interface JourneyEngineDeps {
  store: JourneyStore;
  model: MilestoneModel;
  extraction: ExtractionCapability;
  generation: GenerationCapability;
  /** Share one lock between engines that serve the same store. */
  lock?: JourneyLock;
  options?: Partial<JourneyEngineOptions>;
}

export interface TurnOptions {
  /** Cancels reply generation; the turn then fails like a timed-out one. */
  signal?: AbortSignal;
}

export interface ActionOutcome {
  name: string;
  applied: boolean;
  reason?: string;
}

export interface TurnResult {
  journey: Journey;
  userMessage: Message;
  assistantMessage: Message;
  sentinel: SentinelOutcome;
  template: TemplateId;
  actions: ActionOutcome[];
}

export interface JourneyStateSummary {
  hasJourney: boolean;
  journeyId: number | null;
  milestone: number | null;
  completedCheckpoints: string[];
  milestoneCompleted: boolean;
  status: JourneyStatus | null;
}

export interface SessionRequest {
  userId?: number;
  firstName?: string | null;
  lastName?: string | null;
}

export interface Session {
  user: User;
  journey: Journey;
  recentMessages: Message[];
}

export interface SaveCheckpointResult {
  journey: Journey;
  outcome: 'recorded' | 'already_set';
}

function toTurn(message: Message): ConversationTurn {
  return { speaker: message.speaker, content: message.content };
}

/**
 * Runs turns and journey operations for one journey type. Work on a journey
 * is serialized through the engine's lock, so engines writing to the same
 * store must be given the same `JourneyLock`.
 */
export class JourneyEngine {
  readonly options: JourneyEngineOptions;
  private readonly store: JourneyStore;
  private readonly model: MilestoneModel;
  private readonly generation: GenerationCapability;
  private readonly sentinel: Sentinel;
  private readonly lock: JourneyLock;

  constructor(deps: JourneyEngineDeps) {
    this.store = deps.store;
    this.model = deps.model;
    this.generation = deps.generation;
    this.lock = deps.lock ?? new JourneyLock();
    this.options = {
      sentinelWindow: deps.options?.sentinelWindow ?? SENTINEL_WINDOW,
      generationWindow: deps.options?.generationWindow ?? GENERATION_WINDOW,
      extractionTimeoutMs: deps.options?.extractionTimeoutMs ?? EXTRACTION_TIMEOUT,
      generationTimeoutMs: deps.options?.generationTimeoutMs ?? GENERATION_TIMEOUT,
      keywordFallback: deps.options?.keywordFallback ?? KEYWORD_FALLBACK_ENABLED,
      actionsEnabled: deps.options?.actionsEnabled ?? GENERATION_ACTIONS_ENABLED,
    };
    this.sentinel = new Sentinel(this.store, this.model, deps.extraction, {
      extractionTimeoutMs: this.options.extractionTimeoutMs,
      keywordFallback: this.options.keywordFallback,
    });
  }

  // --- Message processing pipeline ---

  processTurn(
    userId: number,
    journeyId: number,
    userText: string,
    turn: TurnOptions = {},
  ): Promise<TurnResult> {
    return this.lock.run(journeyId, async () => {
      const journey = this.requireOwnedJourney(userId, journeyId);
      if (journey.status === 'abandoned') {
        throw new InvalidTransition(`Journey ${journeyId} was abandoned`, journeyId);
      }

      const userMessage = this.store.appendMessage({
        userId,
        journeyId,
        speaker: 'user',
        content: userText,
        currentMilestone: journey.currentMilestone,
      });

      const window = this.store.getRecentMessages(journeyId, this.options.sentinelWindow);
      const sentinel = await this.sentinel.analyze(journey, window);

      return this.respond(journeyId, userMessage, sentinel, turn.signal);
    });
  }

  /** Answer the journey's last user message after a failed generation. */
  retryTurn(userId: number, journeyId: number, turn: TurnOptions = {}): Promise<TurnResult> {
    return this.lock.run(journeyId, async () => {
      const journey = this.requireOwnedJourney(userId, journeyId);
      if (journey.status === 'abandoned') {
        throw new InvalidTransition(`Journey ${journeyId} was abandoned`, journeyId);
      }
      const [last] = this.store.getRecentMessages(journeyId, 1);
      if (!last || last.speaker !== 'user') {
        throw new NoPendingTurn(journeyId);
      }
      logger.info({ journeyId, userMessageId: last.id }, 'Retrying turn');
      return this.respond(journeyId, last, { kind: 'idle' }, turn.signal);
    });
  }

  private async respond(
    journeyId: number,
    userMessage: Message,
    sentinel: SentinelOutcome,
    cancel: AbortSignal | undefined,
  ): Promise<TurnResult> {
    const snapshot = this.requireJourney(journeyId);
    const template = selectTemplate(this.model, snapshot);
    const systemPrompt = renderPrompt(this.model, snapshot, template, {
      actionsEnabled: this.options.actionsEnabled,
    });
    const history = this.store
      .getRecentMessages(journeyId, this.options.generationWindow)
      .map(toTurn);

    let result: GenerationResult;
    try {
      result = await runWithTimeout(
        (signal) =>
          this.generation.generate({
            systemPrompt,
            history,
            functions: this.options.actionsEnabled ? generationActions : [],
            signal,
          }),
        this.options.generationTimeoutMs,
        'Reply generation',
        cancel,
      );
    } catch (err) {
      logger.error({ err, journeyId, userMessageId: userMessage.id }, 'Generation failed');
      throw new GenerationFailure(
        `Reply generation failed for journey ${journeyId}: ${err instanceof Error ? err.message : String(err)}`,
        journeyId,
        userMessage.id,
        { cause: err },
      );
    }

    const text = result.text.trim();
    if (!text) {
      logger.error({ journeyId, userMessageId: userMessage.id }, 'Generation returned no text');
      throw new GenerationFailure(
        `Reply generation returned no text for journey ${journeyId}`,
        journeyId,
        userMessage.id,
      );
    }

    const assistantMessage = this.store.appendMessage({
      userId: userMessage.userId,
      journeyId,
      speaker: 'assistant',
      content: text,
      currentMilestone: snapshot.currentMilestone,
    });

    const actions = this.options.actionsEnabled
      ? this.applyActions(snapshot, result.calls, userMessage)
      : [];

    const journey = this.requireJourney(journeyId);
    logger.info(
      {
        journeyId,
        template,
        sentinel: sentinel.kind,
        milestone: journey.currentMilestone,
        actions: actions.filter((a) => a.applied).map((a) => a.name),
      },
      'Turn processed',
    );
    return { journey, userMessage, assistantMessage, sentinel, template, actions };
  }

  private applyActions(
    snapshot: Journey,
    calls: FunctionCall[],
    source: Message,
  ): ActionOutcome[] {
    let journey = snapshot;
    const outcomes: ActionOutcome[] = [];

    for (const call of calls) {
      try {
        switch (call.name) {
          case ADVANCE_MILESTONE:
            journey = this.persistAdvance(journey);
            outcomes.push({ name: call.name, applied: true });
            break;
          case COMPLETE_JOURNEY:
            journey = this.persistComplete(journey);
            outcomes.push({ name: call.name, applied: true });
            break;
          case REMEMBER_USER_ATTRIBUTE: {
            const parsed = RememberAttributeArgs.safeParse(call.args);
            if (!parsed.success) {
              outcomes.push({ name: call.name, applied: false, reason: 'malformed arguments' });
              break;
            }
            this.store.appendUserAttribute({
              userId: source.userId,
              key: parsed.data.key,
              value: parsed.data.value,
              sourceMessageId: source.id,
            });
            outcomes.push({ name: call.name, applied: true });
            break;
          }
          default:
            outcomes.push({ name: call.name, applied: false, reason: 'unknown action' });
        }
      } catch (err) {
        if (!(err instanceof InvalidTransition)) throw err;
        logger.warn({ err, journeyId: journey.id, action: call.name }, 'Action skipped');
        outcomes.push({ name: call.name, applied: false, reason: err.message });
      }
    }
    return outcomes;
  }

  // --- Journey operations ---

  getJourneyState(userId: number): JourneyStateSummary {
    if (!this.store.getUser(userId)) throw new UserNotFound(userId);
    const journey = this.store.getActiveJourney(userId) ?? this.store.getLatestJourney(userId);
    if (!journey) {
      return {
        hasJourney: false,
        journeyId: null,
        milestone: null,
        completedCheckpoints: [],
        milestoneCompleted: false,
        status: null,
      };
    }
    return {
      hasJourney: true,
      journeyId: journey.id,
      milestone: journey.currentMilestone,
      completedCheckpoints: completedCheckpoints(this.model, journey),
      milestoneCompleted: isMilestoneComplete(this.model, journey, journey.currentMilestone),
      status: journey.status,
    };
  }

  advanceMilestone(journeyId: number): Promise<Journey> {
    return this.lock.run(journeyId, async () =>
      this.persistAdvance(this.requireServedJourney(journeyId)),
    );
  }

  completeJourney(journeyId: number): Promise<Journey> {
    return this.lock.run(journeyId, async () =>
      this.persistComplete(this.requireServedJourney(journeyId)),
    );
  }

  saveCheckpoint(
    journeyId: number,
    checkpointName: string,
    value: string,
  ): Promise<SaveCheckpointResult> {
    return this.lock.run(journeyId, async () => {
      const journey = this.requireServedJourney(journeyId);
      const checkpoint = this.model.checkpoint(checkpointName);
      const normalized = normalizeCheckpointValue(checkpoint, value);
      if (normalized === null) {
        throw new InvalidCheckpointValue(checkpointName, value, checkpoint.values);
      }
      const result = applyCheckpointValue(
        this.store,
        this.model,
        journey.id,
        checkpointName,
        normalized,
      );
      logger.info(
        { journeyId, checkpoint: checkpointName, value: normalized, outcome: result.outcome },
        'Checkpoint saved',
      );
      return { journey: result.journey, outcome: result.outcome };
    });
  }

  /** Operator action; the engine never abandons a journey on its own. */
  abandonJourney(journeyId: number): Promise<Journey> {
    return this.lock.run(journeyId, async () => {
      const journey = this.requireJourney(journeyId);
      if (journey.status !== 'in_progress') {
        throw new InvalidTransition(
          `Cannot abandon journey ${journeyId}: status is ${journey.status}`,
          journeyId,
        );
      }
      const updated = this.store.updateJourney(journeyId, { status: 'abandoned' });
      if (!updated) throw new JourneyNotFound(journeyId);
      logger.info({ journeyId }, 'Journey abandoned');
      return updated;
    });
  }

  /** Resume the user's in-progress journey or start a new one. */
  startSession(request: SessionRequest = {}): Session {
    let user: User;
    if (request.userId !== undefined) {
      const existing = this.store.getUser(request.userId);
      if (!existing) throw new UserNotFound(request.userId);
      user = existing;
      const firstName = request.firstName ?? user.firstName;
      const lastName = request.lastName ?? user.lastName;
      if (firstName !== user.firstName || lastName !== user.lastName) {
        user = this.store.updateUserNames(user.id, firstName, lastName) ?? user;
      }
    } else {
      user = this.store.createUser(request.firstName, request.lastName);
      logger.info({ userId: user.id }, 'User created');
    }

    let journey = this.store.getActiveJourney(user.id);
    if (journey) {
      this.assertServed(journey);
    } else {
      journey = this.store.createJourney(
        user.id,
        this.model.journeyType,
        this.model.checkpointNames,
        this.model.milestones.map((m) => m.index),
      );
      logger.info({ userId: user.id, journeyId: journey.id }, 'Journey started');
    }

    return {
      user,
      journey,
      recentMessages: this.store.getRecentMessages(journey.id, this.options.generationWindow),
    };
  }

  getConversation(journeyId: number): Message[] {
    this.requireJourney(journeyId);
    return this.store.getMessages(journeyId);
  }

  // --- Internals (caller holds the journey lock) ---

  private persistAdvance(journey: Journey): Journey {
    const next = advance(this.model, journey);
    const updated = this.store.updateJourney(journey.id, {
      currentMilestone: next.currentMilestone,
    });
    if (!updated) throw new JourneyNotFound(journey.id);
    logger.info(
      { journeyId: journey.id, milestone: updated.currentMilestone },
      'Milestone advanced',
    );
    return updated;
  }

  private persistComplete(journey: Journey): Journey {
    const next = complete(this.model, journey);
    const updated = this.store.updateJourney(journey.id, {
      status: next.status,
      currentMilestone: next.currentMilestone,
      milestones: next.milestones,
    });
    if (!updated) throw new JourneyNotFound(journey.id);
    logger.info({ journeyId: journey.id }, 'Journey completed');
    return updated;
  }

  private requireJourney(journeyId: number): Journey {
    const journey = this.store.getJourney(journeyId);
    if (!journey) throw new JourneyNotFound(journeyId);
    return journey;
  }

  private requireServedJourney(journeyId: number): Journey {
    return this.assertServed(this.requireJourney(journeyId));
  }

  private requireOwnedJourney(userId: number, journeyId: number): Journey {
    const journey = this.store.getJourney(journeyId);
    if (!journey || journey.userId !== userId) throw new JourneyNotFound(journeyId);
    return this.assertServed(journey);
  }

  // Journeys of another type, or created before the definition gained a
  // checkpoint, cannot be driven by this model.
  private assertServed(journey: Journey): Journey {
    if (journey.journeyType !== this.model.journeyType) {
      throw new InvalidTransition(
        `Journey ${journey.id} is a "${journey.journeyType}" journey, not "${this.model.journeyType}"`,
        journey.id,
      );
    }
    const missing = this.model.checkpointNames.filter((n) => !(n in journey.checkpoints));
    if (missing.length > 0) {
      throw new InvalidTransition(
        `Journey ${journey.id} has no slot for checkpoint(s) ${missing.join(', ')}`,
        journey.id,
      );
    }
    return journey;
  }
}
