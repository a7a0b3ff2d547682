export function formatNumber(num: number): string {
  return num.toLocaleString("en-US");
}

export function formatHours(seconds: number): string {
  return `${(seconds / 3600).toFixed(2)}h`;
}

export function formatElapsed(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  return `${seconds.toFixed(2)}s (${(seconds / 60).toFixed(2)} min)`;
}

export function pluralize(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? "s" : ""}`;
}
