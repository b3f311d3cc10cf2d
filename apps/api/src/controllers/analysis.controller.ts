import { Request, Response } from "express";
import { analyzeSchema } from "../schemas/analysis.schema";
import * as analysisService from "../services/analysis.service";

export const analyze = (req: Request, res: Response) => {
    const body = analyzeSchema.parse(req.body);
    res.json(analysisService.analyzePassword(body));
};
