// Types for keyscout Studio data
export type {
  ChatSessionSnapshot,
  ChatTurn,
  ClassifiedIntent,
  SecretDescription,
  SecretSummary,
  SecretType,
  SecretValue,
  TypeBreakdown,
  TypeCounts,
} from 'keyscout';

import type { ChatTurn, ClassifiedIntent, SecretDescription, SecretSummary, SecretType, SecretValue, TypeCounts } from 'keyscout';

export type SecretTypeFilter = SecretType | 'all';

export interface ChatResponse {
  sessionId: string;
  turn: ChatTurn;
}

export interface SecretListResponse {
  secrets: SecretSummary[];
  total: number;
}

export interface SecretValueResponse {
  secret: SecretValue;
}

export interface SecretDescriptionResponse {
  secret: SecretDescription;
}

export type CountsResponse = TypeCounts & {
  total: number;
  summary: string;
};

export interface HealthStatus {
  status: 'ok';
  version: string;
  timestamp: string;
  env: string;
}

export interface ApiErrorBody {
  error: string;
  code: string;
}

export const SECRET_TYPE_FILTERS: readonly SecretTypeFilter[] = ['all', 'static', 'rotated', 'dynamic', 'other'];

export interface ChatMessage {
  id: string;
  role: 'user' | 'assistant';
  text: string;
  createdAt: string;
  /** Intent the assistant classified the user message into */
  intent?: ClassifiedIntent['intent'];
  /** Error kind when the turn failed */
  errorKind?: string;
}
