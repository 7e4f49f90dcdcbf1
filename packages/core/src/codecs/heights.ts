import { MalformedDocumentError } from "../errors";
import type { Heights } from "../types";

const STRUCTURED_TAG = "heights_v2";

/**
 * Reads line heights from a PAGE `custom` attribute.
 *
 * `heights_v2:[ascent,descent]` is the current form. Older writers left the word
 * `heights` followed by 2-4 integers; those are recovered by scanning for digits:
 * - 4 numbers [a,b,c,d] -> (a, c)
 * - 3 numbers [a,b,c]   -> (b, c - a)
 * - 2 numbers           -> as written
 */
export function parseHeights(custom: string): Heights | undefined {
  if (custom.includes(STRUCTURED_TAG)) {
    const token = custom.split(/\s+/).find((word) => word.includes(STRUCTURED_TAG));
    const payload = token?.slice(token.indexOf(":") + 1) ?? "";
    let value: unknown;
    try {
      value = JSON.parse(payload);
    } catch {
      throw new MalformedDocumentError(`Unparseable heights "${custom}"`);
    }
    if (!Array.isArray(value) || value.length !== 2 || !value.every((v): v is number => typeof v === "number")) {
      throw new MalformedDocumentError(`Heights must be two numbers, got "${payload}"`);
    }
    return [value[0], value[1]];
  }

  if (!/heights/.test(custom)) return undefined;
  const nums = (custom.match(/\d+/g) || []).map(Number);
  switch (nums.length) {
    case 4:
      return [nums[0], nums[2]];
    case 3:
      return [nums[1], nums[2] - nums[0]];
    case 2:
      return [nums[0], nums[1]];
    default:
      throw new MalformedDocumentError(`Legacy heights need 2-4 numbers, got ${nums.length} in "${custom}"`);
  }
}

function formatHeight(v: number): string {
  const fixed = v.toFixed(1);
  return Number(fixed) === v ? fixed : String(v);
}

export function formatHeights([ascent, descent]: Heights): string {
  return `${STRUCTURED_TAG}:[${formatHeight(ascent)},${formatHeight(descent)}]`;
}
