export {
  checkDraft,
  createEditorialChecks,
  createEditorialGate,
  DEFAULT_EDITORIAL_RULES,
  EDITORIAL_CHECK_NAMES,
  EDITORIAL_GATE_NAME,
  parseEditorialRules,
  type DraftSelfCheck,
  type EditorialArtifact,
  type EditorialRules,
} from './editorial-checks';
export {
  evaluateGate,
  fail,
  fromIssues,
  getFailedChecks,
  notApplicable,
  pass,
  QualityGate,
  type CheckOutcome,
  type CheckSpec,
  type CheckVerdict,
} from './quality-gate';
export {
  createVisualChecks,
  createVisualGate,
  VISUAL_CHECK_NAMES,
  VISUAL_GATE_NAME,
  type ChartArtifacts,
  type VisualArtifact,
} from './visual-checks';
