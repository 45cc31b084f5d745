import fs from 'fs';
import path from 'path';
import { Log } from './Logger';

export function JsonBigIntReplacer(key: string, value: unknown) {
  if (typeof value === 'bigint') {
    return value.toString() + 'n';
  }
  return value;
}

export function JsonBigIntReviver(key: string, value: unknown) {
  if (typeof value === 'string' && /^-?\d+n$/.test(value)) {
    return BigInt(value.slice(0, -1));
  }
  return value;
}

export function ReadJSON<T>(filename: string): T {
  return JSON.parse(fs.readFileSync(filename, 'utf-8'), JsonBigIntReviver);
}

export function WriteJSON(filename: string, obj: unknown) {
  if (!fs.existsSync(path.dirname(filename))) {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }
  fs.writeFileSync(filename, JSON.stringify(obj, JsonBigIntReplacer, 2));
}

/**
 * sleep
 * @param {number} ms milliseconds to sleep
 * @returns async promise
 */
export async function sleep(ms: number) {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export async function WaitUntilScheduled(startDateMs: number, runEverySec: number) {
  const now = Date.now();
  const durationSec = (now - startDateMs) / 1000;
  const timeToSleepSec = runEverySec - durationSec;
  if (timeToSleepSec > 0) {
    Log(`WaitUntilScheduled: sleeping ${timeToSleepSec} seconds`);
    await sleep(timeToSleepSec * 1000);
  }
}
