import { Router } from "express";
import { z } from "zod";
import type { AnalysisService } from "@rxverify/analysis-engine";
import type {
  AnalysisResult,
  ApiErrorBody,
  PrescriptionRequest,
} from "@rxverify/shared-types";

// Integer-like ages: JSON numbers, or strings of digits such as "20".
const ageSchema = z
  .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().nonnegative());

export const prescriptionRequestSchema = z.object({
  text: z.string(),
  age: ageSchema,
}) satisfies z.ZodType<PrescriptionRequest, z.ZodTypeDef, unknown>;

export function createAnalyzeRouter(service: AnalysisService) {
  const router = Router();

  router.post("/analyze/", async (req, res, next) => {
    const parsed = prescriptionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const body: ApiErrorBody = {
        code: "validation_failed",
        message: "Invalid request body",
        details: parsed.error.errors,
      };
      res.status(422).json(body);
      return;
    }

    try {
      const result: AnalysisResult = await service.analyze(
        parsed.data.text,
        parsed.data.age,
      );
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
