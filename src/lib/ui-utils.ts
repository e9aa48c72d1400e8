/**
 * Show a path under $HOME as ~/..., anything else unchanged
 */
export function toUserPath(absolutePath: string): string {
  const home = process.env.HOME;
  if (!home) return absolutePath;
  if (absolutePath === home) return "~";

  // "/home/ann" must not shorten "/home/anna"
  return absolutePath.startsWith(`${home}/`) ? `~${absolutePath.slice(home.length)}` : absolutePath;
}

const RELATIVE_STEPS: Array<{ limit: number; minutes: number; suffix: string }> = [
  { limit: 60, minutes: 1, suffix: "m" },
  { limit: 60 * 24, minutes: 60, suffix: "h" },
  { limit: 60 * 24 * 30, minutes: 60 * 24, suffix: "d" },
];

/**
 * "just now", "5m ago", "3h ago", "9d ago", then a short date
 */
export function formatRelativeTime(isoString: string, now: Date = new Date()): string {
  const date = new Date(isoString);
  const elapsedMinutes = Math.floor((now.getTime() - date.getTime()) / 60_000);

  if (elapsedMinutes < 1) return "just now";

  const step = RELATIVE_STEPS.find((candidate) => elapsedMinutes < candidate.limit);
  if (step) {
    return `${Math.floor(elapsedMinutes / step.minutes)}${step.suffix} ago`;
  }

  return date.toLocaleDateString("en-US", { year: "numeric", month: "short", day: "numeric" });
}

const IRREGULAR_PLURALS: Record<string, string> = {
  repository: "repositories",
};

/**
 * "1 repository", "2 repositories"
 */
export function pluralize(word: string, count: number): string {
  if (count === 1) return word;
  return IRREGULAR_PLURALS[word] ?? `${word}s`;
}

/**
 * Show the first and last four characters of a secret
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return "•".repeat(secret.length);
  }
  return `${secret.slice(0, 4)}••••${secret.slice(-4)}`;
}
