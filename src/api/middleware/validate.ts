import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain } from 'express-validator';
import type { ErrorResponse } from '../../types';

export function validate(validations: ValidationChain[]) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((v) => v.run(req)));
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }
    const details = errors
      .array()
      .map((e) => String(e.msg))
      .join('; ');
    const payload: ErrorResponse = { success: false, error: 'validation_error', details };
    res.status(400).json(payload);
  };
}
