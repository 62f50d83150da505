import type { Timeline } from "../core/timeline.js";
import type { FinancingModuleOutputs } from "../modules/financing/financing-module.js";
import type { OperatingModuleOutputs } from "../modules/operating/operating-module.js";
import type { ProjectionModuleOutputs } from "../modules/projection/projection-module.js";
import type { ReturnsModuleOutputs } from "../modules/returns/returns-module.js";
import type { ResolvedAssumptions, SimulationInputs } from "./inputs.js";

export interface SimulationOutputs {
  financing?: FinancingModuleOutputs;
  operating?: OperatingModuleOutputs;
  projection?: ProjectionModuleOutputs;
  returns?: ReturnsModuleOutputs;
}

export interface SimulationContext {
  timeline: Timeline;
  inputs: SimulationInputs;
  assumptions: ResolvedAssumptions;
  outputs: SimulationOutputs;
  warnings: string[];
}
