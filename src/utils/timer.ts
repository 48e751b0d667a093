export interface Timed<T> {
  value: T;
  durationMs: number;
}

export async function timed<T>(work: () => Promise<T>): Promise<Timed<T>> {
  const start = process.hrtime.bigint();
  const value = await work();
  const durationMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
  return { value, durationMs };
}
