/**
 * Append-only summaries log. One UTF-8 text block per threshold crossing:
 *
 *   [YYYY-MM-DD HH:MM:SS] session_id=<id>
 *   <summary text>
 *   ------------------------------------------------------------
 */

import * as fs from "fs";
import * as path from "path";
import type { SummaryRecord } from "./types";

export const RECORD_SEPARATOR = "-".repeat(60);

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatSummaryRecord(record: SummaryRecord): string {
  return `[${formatTimestamp(record.timestamp)}] session_id=${record.sessionId}\n${record.summaryText}\n${RECORD_SEPARATOR}\n`;
}

export interface ISummaryLog {
  readonly filePath: string;
  append(record: SummaryRecord): Promise<void>;
}

export class SummaryLog implements ISummaryLog {
  constructor(readonly filePath: string) {}

  async append(record: SummaryRecord): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.appendFile(this.filePath, formatSummaryRecord(record), "utf8");
  }
}
