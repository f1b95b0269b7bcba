export type { ReplayStep, StepResult } from "./ReplayScript";
export {
  describeStep,
  parseReplayScript,
  runReplayScript,
} from "./ReplayScript";
