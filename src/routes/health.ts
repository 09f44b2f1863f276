import { Router } from "express";
import mongoose from "mongoose";

const router = Router();

router.get("/health", (_req, res) => {
  res.json({ ok: true, db: mongoose.connection.readyState === 1 ? "up" : "down" });
});

export default router;
