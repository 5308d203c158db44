export * from './types'
export { IntentClassifier, parseClassifierReply, stripCodeFence, ClassifierReplySchema } from './intent-classifier'
export type { IntentClassifierOptions } from './intent-classifier'
export { CLASSIFIER_SYSTEM_PROMPT } from './prompt'
