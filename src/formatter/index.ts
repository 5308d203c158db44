export { ResponseFormatter, CLARIFICATION_TEXT } from './response-formatter'
export { formatCountSummary, parseCountSummary, pluralize } from './count-summary'
export { mask, renderFieldValue, MASK_CHAR, MAX_MASK_LENGTH } from './masking'
