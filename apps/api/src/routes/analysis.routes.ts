import { Router } from "express";
import * as analysisController from "../controllers/analysis.controller";
import { analysisLimiter } from "../middleware/rate-limit.middleware";

const router = Router();

router.post("/analyze", analysisLimiter, analysisController.analyze);

export default router;
