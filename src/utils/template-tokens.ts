/**
 * Placeholder tokens supported in preset values:
 * - {{name}} - replaced by the substitution registered under `name`
 *
 * Built-in substitutions (`preset`, `mode`) are supplied by the resolver;
 * `--define key=value` on the command line adds or overrides entries.
 */

type ReplaceTemplateTokensInput = {
  readonly text: string
  readonly substitutions: ReadonlyMap<string, string>
}

export class TemplateTokenError extends Error {
  constructor(
    message: string,
    public readonly token: string,
    public readonly available: ReadonlyArray<string>,
  ) {
    super(message)
    this.name = "TemplateTokenError"
  }
}

const TOKEN_PATTERN = /\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g

/**
 * Replaces every `{{name}}` token in a single pass, so substituted values are
 * never scanned again.
 *
 * @throws TemplateTokenError if a token has no substitution
 */
export const replaceTemplateTokens = ({ text, substitutions }: ReplaceTemplateTokensInput): string => {
  return text.replace(TOKEN_PATTERN, (_match, token: string) => {
    const value = substitutions.get(token)
    if (value === undefined) {
      const available = Array.from(substitutions.keys()).sort()
      throw new TemplateTokenError(
        `Placeholder "{{${token}}}" has no value. Available placeholders: ${available.join(", ")}`,
        token,
        available,
      )
    }
    return value
  })
}
