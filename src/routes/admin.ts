import { Router } from "express";
import { z } from "zod";
import type { Services } from "../services";
import { VERIFICATION_STATUSES } from "../domain/types";
import { sessionOf } from "../middleware/session";
import { authorizeAction } from "../middleware/authorizeAction";
import { parseInput } from "../utils/validate";

const statusQuerySchema = z.object({
  status: z.enum(["pending", "approved", "rejected"]).optional().default("pending"),
});

const decisionSchema = z.object({
  adminNote: z.string().max(2000).optional(),
});

export default function adminRoutes(services: Services) {
  const router = Router();

  // nothing under /admin is visible to non-admins
  router.use(authorizeAction("viewAdminPanel"));

  router.get("/overview", async (req, res, next) => {
    try {
      const overview = await services.users.adminOverview(sessionOf(req));
      res.json({ overview });
    } catch (err) {
      next(err);
    }
  });

  router.get("/verifications", async (req, res, next) => {
    try {
      const { status } = parseInput(statusQuerySchema, req.query);
      const requests = await services.verifications.listByStatus(sessionOf(req), status);
      res.json({ status, statuses: VERIFICATION_STATUSES, requests });
    } catch (err) {
      next(err);
    }
  });

  router.post("/verifications/:requestId/approve", async (req, res, next) => {
    try {
      const { adminNote } = parseInput(decisionSchema, req.body ?? {});
      const outcome = await services.verifications.approve(sessionOf(req), {
        requestId: req.params.requestId,
        adminNote,
      });
      res.json({
        request: outcome.request,
        badge: outcome.user.badge,
        promotedIdeas: outcome.promotedIdeas.map((i) => i.id),
      });
    } catch (err) {
      next(err);
    }
  });

  router.post("/verifications/:requestId/reject", async (req, res, next) => {
    try {
      const { adminNote } = parseInput(decisionSchema, req.body ?? {});
      const request = await services.verifications.reject(sessionOf(req), {
        requestId: req.params.requestId,
        adminNote,
      });
      res.json({ request });
    } catch (err) {
      next(err);
    }
  });

  router.get("/users", async (req, res, next) => {
    try {
      const users = await services.users.listUsers(sessionOf(req));
      res.json({ users });
    } catch (err) {
      next(err);
    }
  });

  router.delete("/users/:userId", async (req, res, next) => {
    try {
      await services.users.deleteUser(sessionOf(req), req.params.userId);
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
