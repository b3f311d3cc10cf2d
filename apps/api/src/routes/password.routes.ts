import { Router } from "express";
import * as passwordController from "../controllers/password.controller";
import { generationLimiter } from "../middleware/rate-limit.middleware";

const router = Router();

router.post("/generate", generationLimiter, passwordController.generate);
router.post("/passphrase", generationLimiter, passwordController.passphrase);

export default router;
