import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { AppError } from '@api/contracts/error.js';
import type { Logger } from '@logging/logger.js';

/**
 * 判断是否为 JSON 解析错误
 * @param error - 错误对象
 * @returns 如果是JSON解析错误则返回true，否则返回false
 */
function isJsonParseError(error: unknown): error is SyntaxError {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * 创建全局错误处理中间件
 * 能够识别 AppError 实例并返回结构化的错误响应
 * 对于其他类型的错误，返回通用500错误并记录详细日志
 * @param logger - 日志记录器
 * @returns Express 错误处理中间件
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    // 检查JSON解析错误
    if (isJsonParseError(err)) {
      logger.warn('Invalid JSON payload received', {
        path: req.path,
        method: req.method,
        message: err.message,
      });
      const validationError = AppError.createValidationError(
        { originalError: err.message },
        'Invalid JSON payload',
      );
      res.status(validationError.httpStatus).json(validationError.toJSON());
      return;
    }

    const appError = AppError.fromError(err);

    // 记录错误日志
    if (appError.httpStatus >= 500) {
      logger.error(`Server error: ${appError.code} - ${appError.message}`, {
        code: appError.code,
        statusCode: appError.httpStatus,
        path: req.path,
        method: req.method,
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
    } else {
      logger.warn(`Client error: ${appError.code} - ${appError.message}`, {
        code: appError.code,
        statusCode: appError.httpStatus,
        details: appError.details,
        path: req.path,
        method: req.method,
      });
    }

    res.status(appError.httpStatus).json(appError.toJSON());
  };
}
