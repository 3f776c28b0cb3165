import { expect } from "vitest";
import { DuelErrorCode, DuelRuleError } from "../src/engine/types";
import { DieRoller } from "../src/engine/utils";

/** Die roller that hands out the given faces in order and fails loudly when it runs dry. */
export function dice(...faces: number[]): DieRoller & { calls: () => number } {
  let index = 0;
  const roll = () => {
    if (index >= faces.length) {
      throw new Error(`Die roller exhausted after ${faces.length} rolls`);
    }
    return faces[index++];
  };
  return Object.assign(roll, { calls: () => index });
}

export function expectRuleError(fn: () => unknown, code: DuelErrorCode): void {
  let caught: unknown = null;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(DuelRuleError);
  if (caught instanceof DuelRuleError) {
    expect(caught.code).toBe(code);
  }
}
