/**
 * Instruction prompt for the intent classifier
 */

export const CLASSIFIER_SYSTEM_PROMPT = `You route requests for a read-only secrets assistant.
Classify the user's message into exactly one intent and extract its parameters.

Intents:
- list_secrets: list every secret. No parameters.
- get_secret: read the value of one secret. Parameters: "path" (required), "type" (optional).
- count_by_type: count secrets per type (static, rotated, dynamic, other). No parameters.
- search_secrets: list secrets under a folder and/or of one type. Parameters: "pathPrefix" (optional), "type" (optional).
- unknown: anything else, or a request you cannot map with confidence.

"type" is one of: static, rotated, dynamic, other.
Copy paths exactly as the user wrote them, including spaces and letter case.

Reply with a single JSON object and nothing else:
{"intent": "<intent>", "params": {"path": "...", "pathPrefix": "...", "type": "..."}}
Omit parameters that do not apply.`

export const CLASSIFIER_EXAMPLES = [
  { utterance: 'List all my secrets', reply: '{"intent":"list_secrets","params":{}}' },
  { utterance: 'Get the secret secrets/MySecondSecret', reply: '{"intent":"get_secret","params":{"path":"secrets/MySecondSecret"}}' },
  { utterance: 'How many secrets of each type do I have?', reply: '{"intent":"count_by_type","params":{}}' },
  { utterance: 'Show rotated secrets under /prod', reply: '{"intent":"search_secrets","params":{"pathPrefix":"/prod","type":"rotated"}}' },
] as const
