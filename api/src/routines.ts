// api/src/routines.ts
import { Router, type Request, type Response } from "express";
import { assessCondition, conditionDirective } from "./conditionScorer.js";
import type { GenerationOrchestrator } from "./generationOrchestrator.js";
import { AppError, asyncHandler } from "./middleware/errorHandler.js";
import { workoutFor } from "./programCatalog.js";
import {
  ConditionInputSchema,
  GenerateRoutineSchema,
  ProgramParamsSchema,
  UserIdSchema,
  validate,
} from "./validation.js";

export function userIdParam(req: Request): string {
  const v = validate(UserIdSchema, req.params.userId);
  if (!v.success) throw new AppError("Invalid user id", 400, { code: "bad_user_id" });
  return v.data;
}

export function routinesRouter(orchestrator: GenerationOrchestrator): Router {
  const routines = Router();

  routines.post(
    "/users/:userId/routines",
    asyncHandler(async (req: Request, res: Response) => {
      const userId = userIdParam(req);
      const v = validate(GenerateRoutineSchema, req.body ?? {});
      if (!v.success) throw new AppError(v.error, 400, { code: "validation_error" });

      const routine = await orchestrator.generate({ userId, ...v.data });
      res.json({ ok: true, routine });
    })
  );

  routines.post(
    "/users/:userId/condition/score",
    asyncHandler(async (req: Request, res: Response) => {
      userIdParam(req);
      const v = validate(ConditionInputSchema, req.body ?? {});
      if (!v.success) throw new AppError(v.error, 400, { code: "validation_error" });

      const condition = assessCondition(v.data);
      res.json({ ok: true, condition, directive: conditionDirective(condition) });
    })
  );

  routines.get(
    "/programs/:tier/:week/:weekday",
    asyncHandler(async (req: Request, res: Response) => {
      const v = validate(ProgramParamsSchema, req.params);
      if (!v.success) throw new AppError(v.error, 400, { code: "validation_error" });

      const day = workoutFor(v.data.tier, v.data.week, v.data.weekday);
      if (!day) throw new AppError("Program day not found", 404, { code: "not_found" });
      res.json({ ok: true, program: day });
    })
  );

  return routines;
}
