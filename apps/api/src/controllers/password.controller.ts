import { Request, Response } from "express";
import { generateSchema, passphraseSchema } from "../schemas/password.schema";
import * as passwordService from "../services/password.service";

// Thrown validation and domain errors reach errorHandler through Express.
export const generate = (req: Request, res: Response) => {
    const body = generateSchema.parse(req.body);
    res.json(passwordService.generatePasswords(body));
};

export const passphrase = (req: Request, res: Response) => {
    const body = passphraseSchema.parse(req.body ?? {});
    res.json({ passphrase: passwordService.createPassphrase(body) });
};
