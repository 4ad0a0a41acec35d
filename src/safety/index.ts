export { RISK_SEVERITIES, RiskSeveritySchema } from './types.js';
export type {
  RiskSeverity,
  RiskPattern,
  RiskMatch,
  RiskAssessment,
  ConfirmationStep,
  RiskGateDecision,
} from './types.js';

export {
  RISK_PATTERNS,
  SAFE_REPORT,
  assessRisk,
  isRiskyCommand,
  maxSeverity,
  safetyReport,
} from './risk-assessor.js';

export { ACKNOWLEDGEMENT_PHRASE, evaluateRiskGate, confirmationAccepted } from './risk-gate.js';
