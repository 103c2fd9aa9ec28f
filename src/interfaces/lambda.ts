/**
 * AWS Lambda 進入點
 *
 * 由 EventBridge 排程觸發，每次執行一輪檢查後結束。
 * 依 context 剩餘時間設定整體期限，保留一點時間輸出結果。
 */

import { runHealthCheck } from '../core/run.js';
import { toOutcomeRecord } from '../core/outcome.js';

// 預留給結果輸出的時間
const SAFETY_MARGIN_MS = 1_000;

export interface LambdaContextLike {
  getRemainingTimeInMillis(): number;
}

export interface LambdaResponse {
  statusCode: number;
  body: string;
}

export async function handler(_event: unknown, context?: LambdaContextLike): Promise<LambdaResponse> {
  const remaining = context?.getRemainingTimeInMillis();
  const deadlineMs = remaining !== undefined ? Math.max(remaining - SAFETY_MARGIN_MS, 1) : undefined;

  const outcome = await runHealthCheck({ deadlineMs });

  return {
    statusCode: outcome.success ? 200 : 500,
    body: JSON.stringify(toOutcomeRecord(outcome)),
  };
}
