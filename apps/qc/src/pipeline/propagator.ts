// apps/qc/src/pipeline/propagator.ts
//
// Cross-parameter dependency rules. Runs once, after every parameter has its
// own coalesced flags. Default rule (config/qc/default.json):
//   hm0_19 == 4  ->  mdir_qc = 4, tm02_qc = 4

import type { PropagationRuleV1, QcFlagV1, QcNoticeV1 } from "@waveqc/contracts";
import type { ParameterResult } from "./param_runner";

export type PropagationOutcome = {
  results: ParameterResult[];
  notices: QcNoticeV1[];
  // rows forced per dependent parameter
  forcedRows: Record<string, number>;
};

export function applyPropagationRules(
  results: ReadonlyArray<ParameterResult>,
  rules: ReadonlyArray<PropagationRuleV1>
): PropagationOutcome {
  const notices: QcNoticeV1[] = [];
  const forcedRows: Record<string, number> = {};
  const byParam = new Map<string, ParameterResult>();
  for (const r of results) byParam.set(r.parameter, { ...r, qc: r.qc.slice() });

  for (const rule of rules) {
    const source = byParam.get(rule.source_parameter);
    if (!source) {
      notices.push({
        parameter: rule.source_parameter,
        test: "propagation",
        code: "RULE_SKIPPED",
        message: `Propagation from ${rule.source_parameter}_${rule.source_test} skipped: ${rule.source_parameter} not in run`,
      });
      continue;
    }

    const sourceFlags = source.tests[rule.source_test];
    for (const dep of rule.dependent_parameters) {
      const target = byParam.get(dep);
      if (!target) {
        notices.push({
          parameter: dep,
          test: "propagation",
          code: "RULE_SKIPPED",
          message: `Propagation from ${rule.source_parameter}_${rule.source_test} to ${dep} skipped: ${dep} not in run`,
        });
        continue;
      }
      const forcedFlag: QcFlagV1 = rule.forced_flag;
      for (let i = 0; i < sourceFlags.length; i++) {
        if (sourceFlags[i] !== rule.trigger_flag) continue;
        target.qc[i] = forcedFlag;
        forcedRows[dep] = (forcedRows[dep] ?? 0) + 1;
      }
    }
  }

  return {
    results: results.map((r) => byParam.get(r.parameter) ?? r),
    notices,
    forcedRows,
  };
}
