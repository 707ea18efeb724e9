export function hoursToMs(hours: number): number {
  return hours * 60 * 60 * 1000;
}

export function secondsToMs(seconds: number): number {
  return seconds * 1000;
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve) => setTimeout(resolve, ms));
}
