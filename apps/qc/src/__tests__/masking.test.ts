import assert from "node:assert/strict";
import { test } from "node:test";

import { buildWorkingPopulation, isMaskedFlag, scatter } from "../masking/working_population";

test("isMaskedFlag: only flags worse than suspect mask", () => {
  assert.equal(isMaskedFlag(0), false);
  assert.equal(isMaskedFlag(3), false);
  assert.equal(isMaskedFlag(4), true);
  assert.equal(isMaskedFlag(8), true);
  assert.equal(isMaskedFlag(null), false);
  assert.equal(isMaskedFlag(undefined), false);
});

test("working population excludes rows with prior 4 or 8", () => {
  const pop = buildWorkingPopulation([1, 2, 3, 4], [0, 4, 8, 3]);
  assert.deepEqual(pop.positions, [0, 3]);
  assert.deepEqual(pop.values, [1, 4]);
  assert.deepEqual(pop.masked, [false, true, true, false]);
});

test("without prior flags every row is included", () => {
  const pop = buildWorkingPopulation([1, null, 3]);
  assert.deepEqual(pop.positions, [0, 1, 2]);
  assert.deepEqual(pop.values, [1, null, 3]);
  assert.deepEqual(pop.masked, [false, false, false]);
});

test("masking leaves the source column untouched", () => {
  const values = [1, 2, 3];
  buildWorkingPopulation(values, [4, 4, 4]);
  assert.deepEqual(values, [1, 2, 3]);
});

test("scatter writes results back to original positions", () => {
  const pop = buildWorkingPopulation([1, 2, 3, 4], [0, 4, 8, 3]);
  assert.deepEqual(scatter(pop, [7, 9], 4, 0), [7, 0, 0, 9]);
  assert.throws(() => scatter(pop, [1], 4, 0), /1 results for 2 positions/);
});
