/**
 * Records the stages a workflow has reached, and logs each at debug.
 */

import type { Logger } from "pino";
import type { WorkflowStage } from "./types.js";

export class StageTrace {
  private readonly _stages: WorkflowStage[] = [];
  private readonly _logger: Logger;

  constructor(logger: Logger) {
    this._logger = logger;
  }

  enter(stage: WorkflowStage): void {
    this._stages.push(stage);
    this._logger.debug({ stage }, "Stage reached");
  }

  get stages(): readonly WorkflowStage[] {
    return [...this._stages];
  }
}
