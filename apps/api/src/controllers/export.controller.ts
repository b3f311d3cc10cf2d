import { Request, Response } from "express";
import { exportSchema } from "../schemas/export.schema";
import * as exportService from "../services/export.service";

export const exportPasswords = (req: Request, res: Response) => {
    const file = exportService.buildExport(exportSchema.parse(req.body));
    res.attachment(file.filename);
    res.type(file.mimeType);
    res.send(file.body);
};
