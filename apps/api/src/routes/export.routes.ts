import { Router } from "express";
import * as exportController from "../controllers/export.controller";
import { generationLimiter } from "../middleware/rate-limit.middleware";

const router = Router();

router.post("/export", generationLimiter, exportController.exportPasswords);

export default router;
