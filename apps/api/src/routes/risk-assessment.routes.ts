/**
 * Risk Assessment Routes
 *
 * POST /assess-risk: run the risk engine over one buyer application.
 * Preflight OPTIONS requests are answered by the CORS plugin.
 */

import type { FastifyInstance } from 'fastify';
import { riskRoutes, type RiskAssessmentApi } from '@mortgage-risk/contract';
import { RISK_TIER_LABELS, type Verdict } from '@mortgage-risk/domain';
import { registerContractRoute } from '../lib/contract-route.js';
import { ok, fail } from '../utils/reply.js';
import { assessBuyer, toBuyerProfile } from '../services/risk-assessment.service.js';

export async function riskAssessmentRoutes(fastify: FastifyInstance): Promise<void> {
  registerContractRoute(fastify, riskRoutes.assess, '', {
    handler: async (request, reply) => {
      const input = request.contractData.body;
      const result = assessBuyer(toBuyerProfile(input), request.log);

      if (!result.success) {
        return fail(reply, result.code, result.message, 422, { success: false });
      }

      const assessment = formatVerdict(result.verdict);
      return ok(reply, {
        success: true,
        risk_assessment: assessment,
        debug: {
          input_data: input,
          assessment_result: assessment,
        },
      });
    },
  });
}

// ============================================================================
// FORMATTERS (domain → wire)
// ============================================================================

export function formatVerdict(verdict: Verdict): RiskAssessmentApi {
  return {
    risk_level: RISK_TIER_LABELS[verdict.riskTier],
    suggested_actions: verdict.suggestedActions,
    risk_factors: verdict.riskFactors,
    reasons: verdict.reasons,
  };
}
