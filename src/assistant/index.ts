export { Assistant, toTurnError } from './assistant'
export type { AssistantDependencies } from './assistant'
