export { ChatSession, DEFAULT_MAX_TURNS } from './chat-session'
export type { ChatSessionSnapshot, ChatTurn, TurnError } from './chat-session'
