import type { ShortTermResultV1 } from "@waveqc/contracts";

import type { QcConfigV1 } from "./config/schema";
import { computeConfigHash } from "./config/ssot";
import type { QcLogger } from "./logger";
import { runLongTermQc, type LongTermRunInput, type LongTermRunOutput } from "./pipeline/long_term";
import { runShortTermQc, type ShortTermRunInput } from "./pipeline/short_term";

// Holds the loaded config for the HTTP surface. Stateless across runs:
// nothing from one request is kept for the next.
export class QcRuntime {
  public readonly configHash: string;

  constructor(private readonly cfg: QcConfigV1) {
    this.configHash = computeConfigHash(cfg);
  }

  runLongTerm(input: LongTermRunInput, log: QcLogger): LongTermRunOutput {
    return runLongTermQc(this.cfg, input, log);
  }

  runShortTerm(input: ShortTermRunInput, log: QcLogger): ShortTermResultV1[] {
    return runShortTermQc(this.cfg.short_term, input, log);
  }

  describeConfig(): { schema_version: string; config_hash: string; config: QcConfigV1 } {
    return { schema_version: this.cfg.schema_version, config_hash: this.configHash, config: this.cfg };
  }
}
