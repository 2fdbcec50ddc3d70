/**
 * Session ids: `<random>_<epoch ms>_<random>`, generated once per UI client.
 * Uniqueness is probabilistic; a collision merges two clients' histories.
 */

import * as crypto from "crypto";

const RANDOM_MIN = 10000;
const RANDOM_MAX = 99999;

export function generateSessionId(now: () => number = Date.now): string {
  const a = crypto.randomInt(RANDOM_MIN, RANDOM_MAX);
  const b = crypto.randomInt(RANDOM_MIN, RANDOM_MAX);
  return `${a}_${now()}_${b}`;
}
