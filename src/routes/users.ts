import { Router } from "express";
import { z } from "zod";
import type { Services } from "../services";
import { toAccountView } from "../domain/types";
import { sessionOf } from "../middleware/session";
import { authorizeAction } from "../middleware/authorizeAction";
import { parseInput } from "../utils/validate";

const updateSchema = z
  .object({
    name: z.string().min(1).max(100).optional(),
    bio: z.string().max(2000).optional(),
  })
  .refine((v) => v.name !== undefined || v.bio !== undefined, { message: "Nothing to update" });

export default function userRoutes(services: Services) {
  const router = Router();

  router.patch("/me", authorizeAction("updateProfile"), async (req, res, next) => {
    try {
      const update = parseInput(updateSchema, req.body);
      const user = await services.users.updateProfile(sessionOf(req), update);
      res.json({ user: toAccountView(user) });
    } catch (err) {
      next(err);
    }
  });

  router.get("/:userId", async (req, res, next) => {
    try {
      const profile = await services.users.getProfile(req.params.userId);
      res.json(profile);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
