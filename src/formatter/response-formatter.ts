/**
 * Response Formatter
 *
 * Fixed templates per intent, no model involvement. Values are masked
 * unless the turn explicitly asked for one.
 */

import type { ClassifiedIntent } from '../intent/types'
import type { FacadeResult } from '../facade/secret-operations'
import { normalizePrefix } from '../facade/secret-operations'
import type { SecretSummary, SecretType, SecretValue } from '../secrets/types'
import { GatewayRejectedError, isKeyscoutError, NotFoundError } from '../errors'
import { formatCountSummary, pluralize } from './count-summary'
import { mask, renderFieldValue } from './masking'

export const CLARIFICATION_TEXT = [
  "I'm not sure what you'd like me to do. You can ask me to:",
  '- list all your secrets',
  '- get the value of a secret by its path',
  '- count your secrets by type',
  '- search secrets under a path or of a given type',
].join('\n')

function secretLines(secrets: SecretSummary[]): string[] {
  return secrets.map(secret => `- ${secret.path} (${secret.type})`)
}

function searchScope(pathPrefix: string | undefined, type: SecretType | undefined): string {
  const prefix = normalizePrefix(pathPrefix) || '/'
  return type ? `${prefix} of type ${type}` : prefix
}

export class ResponseFormatter {
  format(classified: ClassifiedIntent, result: FacadeResult): string {
    switch (result.operation) {
      case 'list_secrets':
        if (result.secrets.length === 0) return 'No secrets found.'
        return [`You have ${pluralize(result.secrets.length, 'secret')}:`, ...secretLines(result.secrets)].join('\n')

      case 'get_secret_value':
        return this.formatValue(result.value, classified.intent === 'get_secret')

      case 'count_by_type':
        return formatCountSummary(result.counts)

      case 'search_secrets': {
        const scope = searchScope(result.pathPrefix, result.type)
        if (result.secrets.length === 0) return `No secrets found under ${scope}.`
        return [`Found ${pluralize(result.secrets.length, 'secret')} under ${scope}:`, ...secretLines(result.secrets)].join('\n')
      }
    }
  }

  formatValue(value: SecretValue, reveal: boolean): string {
    const render = (text: string) => (reveal ? text : mask(text))
    const header = `Secret ${value.path} (${value.type}):`

    if (value.kind === 'simple') {
      return `${header}\n  value: ${render(value.value)}`
    }

    const lines = Object.entries(value.fields).map(
      ([field, fieldValue]) => `  ${field}: ${render(renderFieldValue(fieldValue))}`
    )
    return [header, ...lines].join('\n')
  }

  clarification(): string {
    return CLARIFICATION_TEXT
  }

  /**
   * One user-facing sentence per error kind; upstream detail stays in the logs
   */
  formatError(error: unknown): string {
    if (!isKeyscoutError(error)) {
      return 'Sorry, something went wrong while handling that request.'
    }

    switch (error.kind) {
      case 'classification_failure':
        return "Sorry, I couldn't interpret that request because the language service is unavailable. Please try again in a moment."
      case 'unknown_intent':
        return CLARIFICATION_TEXT
      case 'not_found':
        return error instanceof NotFoundError
          ? `Sorry, no secret exists at ${error.path}.`
          : 'Sorry, no secret exists at that path.'
      case 'access_denied':
        return "Sorry, the configured credentials don't have permission for that."
      case 'upstream_unavailable':
        if (error instanceof GatewayRejectedError) {
          return "Sorry, the secrets service couldn't process that request."
        }
        return 'Sorry, the secrets service is unreachable right now. Please try again later.'
      case 'timeout':
        return 'Sorry, the request took too long to complete. Please try again.'
    }
  }
}
