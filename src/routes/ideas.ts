import { Router } from "express";
import { z } from "zod";
import type { Services } from "../services";
import { sessionOf } from "../middleware/session";
import { authorizeAction } from "../middleware/authorizeAction";
import { parseInput } from "../utils/validate";
import { attachmentsSchema } from "./schemas";

const listQuerySchema = z.object({
  q: z.string().max(200).optional(),
  tags: z.string().max(500).optional(),
  minRating: z.coerce.number().min(0).max(5).optional().default(0),
});

const createSchema = z.object({
  title: z.string().min(1).max(200),
  description: z.string().min(1).max(10_000),
  tags: z.string().max(500).optional(),
  attachments: attachmentsSchema,
});

const reviewSchema = z.object({
  rating: z.number().int().min(1).max(5),
  comment: z.string().max(5000).optional(),
});

const prioritySchema = z.object({ priority: z.boolean() });

export default function ideaRoutes(services: Services) {
  const router = Router();

  router.get("/", async (req, res, next) => {
    try {
      const { q, tags, minRating } = parseInput(listQuerySchema, req.query);
      const ideas = await services.ideas.listRanked({ keyword: q, tags, minRating });
      res.json({ ideas });
    } catch (err) {
      next(err);
    }
  });

  router.post("/", authorizeAction("submitIdea"), async (req, res, next) => {
    try {
      const input = parseInput(createSchema, req.body);
      const idea = await services.ideas.submit(sessionOf(req), input);
      res.status(201).json({ idea });
    } catch (err) {
      next(err);
    }
  });

  router.get("/:ideaId", async (req, res, next) => {
    try {
      const detail = await services.ideas.get(req.params.ideaId);
      res.json(detail);
    } catch (err) {
      next(err);
    }
  });

  router.post("/:ideaId/reviews", authorizeAction("postReview"), async (req, res, next) => {
    try {
      const input = parseInput(reviewSchema, req.body);
      const { review, avgRating } = await services.ideas.postReview(sessionOf(req), req.params.ideaId, input);
      res.status(201).json({ review, avgRating });
    } catch (err) {
      next(err);
    }
  });

  // open to anonymous visitors
  router.post("/:ideaId/upvote", async (req, res, next) => {
    try {
      const idea = await services.ideas.upvote(sessionOf(req), req.params.ideaId);
      res.json({ idea });
    } catch (err) {
      next(err);
    }
  });

  router.delete("/:ideaId", authorizeAction("deleteIdea"), async (req, res, next) => {
    try {
      await services.ideas.delete(sessionOf(req), req.params.ideaId);
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  router.put("/:ideaId/priority", authorizeAction("setPriority"), async (req, res, next) => {
    try {
      const { priority } = parseInput(prioritySchema, req.body);
      const idea = await services.ideas.setPriority(sessionOf(req), req.params.ideaId, priority);
      res.json({ idea });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
