import { randomBytes } from 'node:crypto';

export function generateJobId(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10).replace(/-/g, '');
  const rand = randomBytes(3).toString('hex');
  return `job_${date}_${rand}`;
}
