import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { z, ZodTypeAny } from 'zod';
import { AppError } from '@api/contracts/error.js';

/**
 * 请求的可校验部分
 */
export interface RequestParts {
  body: unknown;
  query: unknown;
  params: unknown;
}

/**
 * 创建一个Express处理器，先用 Zod Schema 校验请求，再调用业务处理函数
 * Schema 描述 `{ body, query, params }` 整体，校验后的结果以强类型传给 handler
 * 校验失败时转交 VALIDATION_ERROR，handler 抛出的异常转交错误处理中间件
 *
 * @param schema Zod Schema，形如 `z.object({ query: ..., params: ... })`
 * @param handler 业务处理函数
 * @returns Express 处理器
 */
export function validate<S extends ZodTypeAny>(
  schema: S,
  handler: (input: z.infer<S>, req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const parts: RequestParts = {
      body: req.body,
      query: req.query,
      params: req.params,
    };
    const result = schema.safeParse(parts);

    if (!result.success) {
      const validationErrors = result.error.errors.map((err) => ({
        path: err.path.join('.'),
        message: err.message,
      }));
      next(
        AppError.createValidationError(
          { issues: validationErrors },
          `Validation failed for fields: ${validationErrors.map((e) => e.path).join(', ')}`,
        ),
      );
      return;
    }

    handler(result.data, req, res).catch(next);
  };
}
