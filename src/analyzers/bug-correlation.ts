// Plain substrings, so "fixes", "bugfix" and "errors" all count.
export const BUG_KEYWORDS = ['fix', 'bug', 'error', 'broken', 'issue', 'hotfix'] as const;

/** True when a commit message reads like a bug fix. */
export function isBugFixMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return BUG_KEYWORDS.some(keyword => lower.includes(keyword));
}
