import assert from "node:assert/strict";
import { test } from "node:test";

import type { PropagationRuleV1 } from "@waveqc/contracts";
import { runParameter } from "../pipeline/param_runner";
import { applyPropagationRules } from "../pipeline/propagator";
import { defaultConfig, paramConfig } from "./fixtures";

const RULES = defaultConfig().long_term.propagation_rules;

function evaluate(hm0: Array<number | null>) {
  const n = hm0.length;
  return [
    runParameter("hm0", hm0, null, paramConfig({ range: { min: 0, max: 30, critical: true } })),
    runParameter("mdir", Array.from({ length: n }, (_, i) => 10 * (i + 1)), null, paramConfig({ parameter: "mdir" })),
    runParameter("tm02", Array.from({ length: n }, (_, i) => 5 + i), null, paramConfig({ parameter: "tm02" })),
  ];
}

test("hm0_19 fail forces mdir and tm02 qc to 4", () => {
  const results = evaluate([1, 2, 3, 35, 2]);
  const out = applyPropagationRules(results, RULES);

  const byParam = new Map(out.results.map((r) => [r.parameter, r]));
  assert.deepEqual(byParam.get("hm0")?.qc, [0, 0, 0, 4, 0]);
  assert.deepEqual(byParam.get("mdir")?.qc, [0, 0, 0, 4, 0]);
  assert.deepEqual(byParam.get("tm02")?.qc, [0, 0, 0, 4, 0]);
  assert.deepEqual(out.forcedRows, { mdir: 1, tm02: 1 });
  assert.deepEqual(out.notices, []);
});

test("propagation leaves the evaluated results untouched", () => {
  const results = evaluate([1, 2, 3, 35, 2]);
  applyPropagationRules(results, RULES);
  assert.deepEqual(results[1].qc, [0, 0, 0, 0, 0]);
  // test columns themselves are never rewritten
  const out = applyPropagationRules(results, RULES);
  assert.deepEqual(out.results[1].tests["19"], [0, 0, 0, 0, 0]);
});

test("a non-critical range violation does not trigger the rule", () => {
  const results = [
    runParameter("hm0", [1, 35, 2], null, paramConfig({ range: { min: 0, max: 30, critical: false } })),
    runParameter("mdir", [10, 20, 30], null, paramConfig({ parameter: "mdir" })),
  ];
  const out = applyPropagationRules(results, RULES);
  assert.deepEqual(out.results[0].qc, [0, 3, 0]);
  assert.deepEqual(out.results[1].qc, [0, 0, 0]);
});

test("rules referencing parameters outside the run are skipped with notices", () => {
  const hm0Only = [runParameter("hm0", [1, 35], null, paramConfig({ range: { min: 0, max: 30, critical: true } }))];
  const partial = applyPropagationRules(hm0Only, RULES);
  assert.deepEqual(
    partial.notices.map((n) => [n.parameter, n.code]),
    [
      ["mdir", "RULE_SKIPPED"],
      ["tm02", "RULE_SKIPPED"],
    ]
  );
  assert.deepEqual(partial.forcedRows, {});

  const mdirOnly = [runParameter("mdir", [10, 20], null, paramConfig({ parameter: "mdir" }))];
  const noSource = applyPropagationRules(mdirOnly, RULES);
  assert.equal(noSource.notices.length, 1);
  assert.equal(noSource.notices[0].message, "Propagation from hm0_19 skipped: hm0 not in run");
});

test("custom rules propagate from any test", () => {
  const rule: PropagationRuleV1 = {
    source_parameter: "hm0",
    source_test: "missing",
    trigger_flag: 8,
    forced_flag: 3,
    dependent_parameters: ["mdir"],
  };
  const results = [
    runParameter("hm0", [1, null, 2], null, paramConfig()),
    runParameter("mdir", [10, 20, 30], null, paramConfig({ parameter: "mdir" })),
  ];
  const out = applyPropagationRules(results, [rule]);
  assert.deepEqual(out.results[1].qc, [0, 3, 0]);
});
