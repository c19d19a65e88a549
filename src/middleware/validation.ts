import { Request, Response, NextFunction, RequestHandler } from 'express';
import { z, ZodTypeAny } from 'zod';

export interface ValidationConfig {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
}

export interface FieldError {
  field: string;
  message: string;
  code: string;
}

export const formatZodIssues = (error: z.ZodError): FieldError[] =>
  error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));

export const createValidationMiddleware = (config: ValidationConfig): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      if (config.body) {
        req.body = config.body.parse(req.body ?? {});
      }

      if (config.params) {
        config.params.parse(req.params);
      }

      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({
          success: false,
          message: 'Validation failed',
          errors: formatZodIssues(error),
        });
        return;
      }
      next(error);
    }
  };
};

export default createValidationMiddleware;
