/**
 * Ordered identifier candidates for GPG operations that may not accept the
 * bare key id.
 */

/**
 * The identifiers to try, in order: the key id, then `<user>@<domain>`.
 */
export function fallbackIdentifiers(keyId: string, username: string, emailDomain: string): string[] {
  return [keyId, `${username}@${emailDomain}`]
}

/**
 * Call `attempt` for each candidate until one succeeds.
 *
 * @param onFallback - Called before every attempt after the first.
 * @returns The accepted candidate, or `undefined` if all of them failed.
 */
export async function tryCandidates(
  candidates: readonly string[],
  attempt: (candidate: string) => Promise<boolean>,
  onFallback?: (candidate: string) => void,
): Promise<string | undefined> {
  for (const [index, candidate] of candidates.entries()) {
    if (index > 0) {
      onFallback?.(candidate)
    }
    if (await attempt(candidate)) {
      return candidate
    }
  }
  return undefined
}
