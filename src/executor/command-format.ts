import type { DriverCommand } from "../contracts"

const SAFE_TOKEN_PATTERN = /^[A-Za-z0-9_\-+=.,/:@%]+$/

export const quoteToken = (token: string): string => {
  if (SAFE_TOKEN_PATTERN.test(token)) {
    return token
  }
  return `'${token.replace(/'/g, `'\\''`)}'`
}

/**
 * Renders a driver command as a line that can be pasted into a POSIX shell.
 */
export const formatCommand = ({ command, args }: DriverCommand): string => {
  return [command, ...args].map(quoteToken).join(" ")
}
