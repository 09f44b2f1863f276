import { Router } from "express";
import { z } from "zod";
import type { Services } from "../services";
import { sessionOf } from "../middleware/session";
import { authorizeAction } from "../middleware/authorizeAction";
import { parseInput } from "../utils/validate";
import { attachmentsSchema } from "./schemas";

const requestSchema = z.object({
  claim: z.string().min(1).max(200),
  details: z.string().max(5000).optional(),
  proofs: attachmentsSchema,
});

export default function verificationRoutes(services: Services) {
  const router = Router();

  router.use(authorizeAction("requestVerification"));

  router.post("/", async (req, res, next) => {
    try {
      const input = parseInput(requestSchema, req.body);
      const request = await services.verifications.request(sessionOf(req), input);
      res.status(201).json({ request });
    } catch (err) {
      next(err);
    }
  });

  router.get("/mine", async (req, res, next) => {
    try {
      const requests = await services.verifications.listMine(sessionOf(req));
      res.json({ requests });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
