export type JourneyStatus = 'in_progress' | 'completed' | 'abandoned';

export type Speaker = 'user' | 'assistant';

export interface User {
  id: number;
  firstName: string | null;
  lastName: string | null;
  createdAt: string; // ISO timestamp
}

export interface MilestoneState {
  completed: boolean;
  completedAt: string | null;
}

export interface Journey {
  id: number;
  userId: number;
  journeyType: string;
  currentMilestone: number;
  status: JourneyStatus;
  /** One slot per checkpoint of the journey definition; null until collected. */
  checkpoints: Record<string, string | null>;
  /** Keyed by milestone index (1-based). */
  milestones: Record<number, MilestoneState>;
  createdAt: string;
  updatedAt: string;
}

export interface Message {
  id: number;
  userId: number;
  journeyId: number;
  speaker: Speaker;
  content: string;
  currentMilestone: number; // milestone active when the message was sent
  timestamp: string;
}

export interface UserAttribute {
  id: number;
  userId: number;
  key: string;
  value: string;
  sourceMessageId: number | null;
  createdAt: string;
}

/**
 * Fields `updateJourney` may change. Checkpoint values are only ever added
 * and milestone flags only ever raised; the store ignores attempts to do
 * otherwise.
 */
export interface JourneyPatch {
  currentMilestone?: number;
  status?: JourneyStatus;
  checkpoints?: Record<string, string>;
  milestones?: Record<number, MilestoneState>;
}

export interface NewMessage {
  userId: number;
  journeyId: number;
  speaker: Speaker;
  content: string;
  currentMilestone: number;
}

export interface NewUserAttribute {
  userId: number;
  key: string;
  value: string;
  sourceMessageId: number | null;
}

export interface JourneyStore {
  createUser(firstName?: string | null, lastName?: string | null): User;
  getUser(id: number): User | undefined;
  updateUserNames(id: number, firstName: string | null, lastName: string | null): User | undefined;

  createJourney(userId: number, journeyType: string, checkpointNames: string[], milestoneIndices: number[]): Journey;
  getJourney(id: number): Journey | undefined;
  /** The user's newest in_progress journey. */
  getActiveJourney(userId: number): Journey | undefined;
  /** The user's newest journey, whatever its status. */
  getLatestJourney(userId: number): Journey | undefined;
  updateJourney(id: number, patch: JourneyPatch): Journey | undefined;

  appendMessage(message: NewMessage): Message;
  /** Last `limit` messages of a journey, oldest first. */
  getRecentMessages(journeyId: number, limit: number): Message[];
  getMessages(journeyId: number): Message[];

  appendUserAttribute(attribute: NewUserAttribute): UserAttribute;
  getUserAttributes(userId: number): UserAttribute[];
}
