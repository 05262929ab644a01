import { DeniedDecision } from './accessPolicy';

export interface DecisionErrorBody {
  error: {
    code: 'ACCOUNT_BANNED' | 'REGISTRATION_RESTRICTED' | 'PENDING_LIMIT_REACHED';
    message: string;
    decision: DeniedDecision;
  };
}

export const decisionErrorCode = (decision: DeniedDecision): DecisionErrorBody['error']['code'] => {
  if (decision.status === 'permanently_banned') return 'ACCOUNT_BANNED';
  return decision.reason === 'low_points' ? 'REGISTRATION_RESTRICTED' : 'PENDING_LIMIT_REACHED';
};

export const decisionErrorBody = (decision: DeniedDecision): DecisionErrorBody => ({
  error: {
    code: decisionErrorCode(decision),
    message: decision.message,
    decision,
  },
});
