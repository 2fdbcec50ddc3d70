/**
 * Response aggregator: turns a fragment sequence into UI snapshots.
 *
 * Each snapshot is the committed history, the user's turn and the reply so far.
 * The generator's return value tells the caller whether the stream completed.
 */

import type { ConversationHistory, Turn } from "../memory/types";
import { toError } from "../logging";

export type AggregationOutcome =
  | { status: "completed"; reply: string; fragments: number; firstFragmentMs?: number }
  | { status: "failed"; reply: string; fragments: number; firstFragmentMs?: number; error: Error };

export function buildSnapshot(base: ConversationHistory, input: string, reply: string): Turn[] {
  return [
    ...base,
    { role: "user", content: input },
    { role: "assistant", content: reply },
  ];
}

/**
 * Yield one snapshot per non-empty fragment. On a stream error, yield one more
 * snapshot carrying the partial reply and return a "failed" outcome.
 */
export async function* aggregateResponse(
  fragments: AsyncIterable<string>,
  base: ConversationHistory,
  input: string
): AsyncGenerator<Turn[], AggregationOutcome, undefined> {
  const start = Date.now();
  let reply = "";
  let count = 0;
  let firstFragmentMs: number | undefined;
  try {
    for await (const fragment of fragments) {
      if (!fragment) continue;
      if (firstFragmentMs === undefined) firstFragmentMs = Date.now() - start;
      reply += fragment;
      count++;
      yield buildSnapshot(base, input, reply);
    }
  } catch (err) {
    yield buildSnapshot(base, input, reply);
    return { status: "failed", reply, fragments: count, firstFragmentMs, error: toError(err) };
  }
  return { status: "completed", reply, fragments: count, firstFragmentMs };
}
