/**
 * Web API handler for plan creation
 * Answers with the wire-shaped response: schedule as an array, no placeholders on failure
 */
import { z } from 'zod';
import type { CreatePlanServiceResponse } from '../plannerApi/types';
import { toServiceResponse, type PlanService } from '../plannerApi/planService';

const createPlanParamsSchema = z.object({
  entryId: z.string().trim().min(1),
});

export async function handleCreatePlanRequest(
  planService: PlanService,
  params: unknown,
  body: unknown,
): Promise<CreatePlanServiceResponse> {
  const parsed = createPlanParamsSchema.safeParse(params);
  if (!parsed.success) {
    return { success: false, error: 'Missing entry id' };
  }

  const result = await planService.createPlan(parsed.data.entryId, body);
  return toServiceResponse(result);
}
