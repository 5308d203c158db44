/**
 * Studio Store - Single source of truth for all Studio state
 *
 * Uses Zustand with granular subscriptions. The store is built around a
 * KeyscoutClient so tests can hand in one backed by a stub fetch.
 */

import { create } from 'zustand';
import { devtools } from 'zustand/middleware';
import { KeyscoutApiError, keyscoutClient, type KeyscoutClient } from '../lib/keyscout-client';
import type {
  ChatMessage,
  CountsResponse,
  SecretDescription,
  SecretSummary,
  SecretTypeFilter,
  SecretValue,
  TypeBreakdown,
} from '../types/keyscout';

export type StudioTab = 'chat' | 'secrets' | 'analytics';

export interface SecretFilter {
  pathPrefix: string;
  type: SecretTypeFilter;
}

export interface SelectedSecret {
  path: string;
  value?: SecretValue;
  description?: SecretDescription;
}

export interface StudioState {
  // Chat
  sessionId: string | null;
  messages: ChatMessage[];
  isSending: boolean;

  // Secret browser
  secrets: SecretSummary[];
  filter: SecretFilter;
  secretsLoading: boolean;
  selectedSecret: SelectedSecret | null;

  // Analytics
  counts: CountsResponse | null;
  breakdown: TypeBreakdown | null;
  analyticsLoading: boolean;

  // UI state
  activeTab: StudioTab;
  error: string | null;

  // Actions - Chat
  sendMessage: (text: string) => Promise<void>;
  clearChat: () => Promise<void>;

  // Actions - Secret browser
  setFilter: (filter: Partial<SecretFilter>) => void;
  searchSecrets: () => Promise<void>;
  fetchValue: (path: string, type?: SecretTypeFilter) => Promise<void>;
  fetchDescription: (path: string) => Promise<void>;
  closeSecret: () => void;

  // Actions - Analytics
  loadAnalytics: () => Promise<void>;

  // Actions - UI
  setActiveTab: (tab: StudioTab) => void;
  dismissError: () => void;
}

export function describeError(error: unknown): string {
  if (error instanceof KeyscoutApiError) return error.message;
  if (error instanceof Error) return `Could not reach the keyscout API: ${error.message}`;
  return 'Could not reach the keyscout API';
}

let messageCounter = 0;

function localMessage(role: ChatMessage['role'], text: string, extra: Partial<ChatMessage> = {}): ChatMessage {
  messageCounter += 1;
  return { id: `local-${messageCounter}`, role, text, createdAt: new Date().toISOString(), ...extra };
}

// A reply for a secret that is no longer selected is dropped
function mergeSelected(
  state: StudioState,
  path: string,
  update: Omit<SelectedSecret, 'path'>
): Partial<StudioState> {
  const current = state.selectedSecret;
  if (current?.path !== path) return {};
  return { selectedSecret: { ...current, ...update } };
}

export function createStudioStore(client: KeyscoutClient) {
  return create<StudioState>()(
    devtools(
      (set, get) => ({
        // Initial state
        sessionId: null,
        messages: [],
        isSending: false,
        secrets: [],
        filter: { pathPrefix: '', type: 'all' },
        secretsLoading: false,
        selectedSecret: null,
        counts: null,
        breakdown: null,
        analyticsLoading: false,
        activeTab: 'chat',
        error: null,

        // Chat actions
        sendMessage: async (text) => {
          const message = text.trim();
          if (!message || get().isSending) return;

          set((state) => ({
            messages: [...state.messages, localMessage('user', message)],
            isSending: true,
            error: null,
          }));

          try {
            const { sessionId, turn } = await client.chat(message, get().sessionId);
            set((state) => ({
              sessionId,
              isSending: false,
              messages: [
                ...state.messages,
                {
                  id: turn.id,
                  role: 'assistant',
                  text: turn.response,
                  createdAt: turn.createdAt,
                  intent: turn.classified?.intent,
                  errorKind: turn.error?.kind,
                },
              ],
            }));
          } catch (error) {
            const text = describeError(error);
            set((state) => ({
              isSending: false,
              error: text,
              messages: [...state.messages, localMessage('assistant', text, { errorKind: 'transport' })],
            }));
          }
        },

        clearChat: async () => {
          const { sessionId } = get();
          set({ messages: [], sessionId: null, error: null });
          if (!sessionId) return;
          try {
            await client.clearSession(sessionId);
          } catch (error) {
            // A session the server already evicted is as good as cleared
            if (!(error instanceof KeyscoutApiError && error.status === 404)) {
              set({ error: describeError(error) });
            }
          }
        },

        // Secret browser actions
        setFilter: (filter) =>
          set((state) => ({ filter: { ...state.filter, ...filter } })),

        searchSecrets: async () => {
          set({ secretsLoading: true, error: null });
          try {
            const { filter } = get();
            const { secrets } = await client.listSecrets({
              pathPrefix: filter.pathPrefix.trim() || undefined,
              type: filter.type,
            });
            set({ secrets, secretsLoading: false });
          } catch (error) {
            set({ secretsLoading: false, error: describeError(error) });
          }
        },

        fetchValue: async (path, type) => {
          set((state) => ({
            selectedSecret: state.selectedSecret?.path === path ? state.selectedSecret : { path },
            error: null,
          }));
          try {
            const { secret } = await client.getSecretValue(path, type);
            set((state) => mergeSelected(state, path, { value: secret }));
          } catch (error) {
            if (get().selectedSecret?.path === path) set({ error: describeError(error) });
          }
        },

        fetchDescription: async (path) => {
          set((state) => ({
            selectedSecret: state.selectedSecret?.path === path ? state.selectedSecret : { path },
            error: null,
          }));
          try {
            const { secret } = await client.describeSecret(path);
            set((state) => mergeSelected(state, path, { description: secret }));
          } catch (error) {
            if (get().selectedSecret?.path === path) set({ error: describeError(error) });
          }
        },

        closeSecret: () =>
          set({ selectedSecret: null }),

        // Analytics actions
        loadAnalytics: async () => {
          set({ analyticsLoading: true, error: null });
          try {
            const [counts, breakdown] = await Promise.all([client.getCounts(), client.getBreakdown()]);
            set({ counts, breakdown, analyticsLoading: false });
          } catch (error) {
            set({ analyticsLoading: false, error: describeError(error) });
          }
        },

        // UI actions
        setActiveTab: (tab) =>
          set({ activeTab: tab }),

        dismissError: () =>
          set({ error: null }),
      }),
      { name: 'KeyscoutStudio' }
    )
  );
}

export const useStudio = createStudioStore(keyscoutClient);

// Selectors
export const useSecretCount = () =>
  useStudio((state) => state.secrets.length);

