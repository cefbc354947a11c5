import { isInteger, isSafeNumber, parse } from 'lossless-json';

/**
 * `text_match` is a uint64. Integers past 2^53 become bigint so distinct
 * scores stay distinct.
 */
const parseNumber = (value: string): number | bigint =>
  isInteger(value) && !isSafeNumber(value) ? BigInt(value) : parseFloat(value);

// Only text_match keeps its bigint; Express cannot serialize one.
const reviveNumbers = (key: string, value: unknown): unknown =>
  typeof value === 'bigint' && key !== 'text_match' ? Number(value) : value;

/**
 * Axios response transformer. Non-JSON bodies (plain-text errors) are
 * returned as they came.
 */
export function parseTypesenseJson(data: unknown): unknown {
  if (typeof data !== 'string' || data.trim() === '') {
    return data;
  }
  try {
    return parse(data, reviveNumbers, parseNumber);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return data;
    }
    throw error;
  }
}
