/**
 * sqlgate Response Model — per-item outcomes and the wire envelopes
 *
 * Every item yields a ResponseItem, never a driver-specific value. Absent
 * fields are left out entirely so the JSON stays minimal.
 */

import type { FailureResponse, JsonRow, ResponseItem, SuccessResponse } from './types.js';

/** errorCode for failures that happen before any item is processed. */
export const REQUEST_LEVEL_ERROR = -1;

export function queryResult(resultSet: JsonRow[]): ResponseItem {
  return { success: true, resultSet };
}

export function statementResult(rowsUpdated: number): ResponseItem {
  return { success: true, rowsUpdated };
}

export function batchResult(rowsUpdatedBatch: number[]): ResponseItem {
  return { success: true, rowsUpdatedBatch };
}

export function failedItem(error: string): ResponseItem {
  return { success: false, error };
}

export function okResponse(results: ResponseItem[]): SuccessResponse {
  return { success: true, results };
}

export function errorResponse(errorCode: number, message: string): FailureResponse {
  return { success: false, errorCode, message };
}
