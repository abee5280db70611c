import { z } from 'zod';

/**
 * 定义统一错误格式的Zod Schema
 * @description 定义API响应中错误信息的标准格式
 */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string().describe('错误码，例如 VALIDATION_ERROR'),
    message: z.string().describe('人类可读的错误信息'),
    details: z
      .record(z.unknown())
      .optional()
      .describe('可选：错误的额外详细信息'),
  }),
});

/**
 * ErrorResponse类型定义
 */
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

/**
 * 错误码枚举
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}

/**
 * 应用程序错误类
 * @description 统一的错误处理类，包含错误码、HTTP状态码和详细信息
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly details?: Record<string, unknown>;

  /**
   * 创建AppError实例
   * @param code - 错误码
   * @param message - 错误信息
   * @param httpStatus - HTTP状态码
   * @param details - 错误详细信息
   */
  constructor(
    code: ErrorCode,
    message: string,
    httpStatus: number = 500,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = httpStatus;
    this.details = details;
    Object.setPrototypeOf(this, AppError.prototype); // 修复原型链
  }

  /**
   * 将错误转换为JSON格式
   * @returns 符合API响应格式的错误对象
   */
  public toJSON(): ErrorResponse {
    const response: ErrorResponse = {
      error: {
        code: this.code,
        message: this.message,
      },
    };

    // 只有当details存在且有内容时才添加
    if (this.details && Object.keys(this.details).length > 0) {
      response.error.details = this.details;
    }

    return response;
  }

  /**
   * 将未知错误转换为AppError，默认为 INTERNAL_ERROR
   * 内部错误不携带原始信息，避免泄露实现细节
   * @param error 原始错误
   * @returns AppError 实例
   */
  public static fromError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }
    return AppError.createInternalServerError('Internal server error');
  }

  /**
   * 创建一个VALIDATION_ERROR 类型的AppError
   * @param details - 验证失败的字段和原因
   * @param message - 错误信息
   * @returns AppError 实例
   */
  public static createValidationError(
    details: Record<string, unknown>,
    message: string = 'Validation failed.',
  ): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  /**
   * Creates a NOT_FOUND error.
   * @param message - The error message.
   * @returns AppError 实例
   */
  public static createNotFoundError(
    message: string = 'Resource not found.',
  ): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404);
  }

  /**
   * Creates a CONFLICT error.
   * @param message - The error message.
   * @param details - Optional details.
   * @returns AppError 实例
   */
  public static createConflictError(
    message: string,
    details?: Record<string, unknown>,
  ): AppError {
    return new AppError(ErrorCode.CONFLICT, message, 409, details);
  }

  /**
   * 创建一个INTERNAL_ERROR 类型的AppError
   * @param message - 错误信息
   * @param details - 错误详细信息
   * @returns AppError 实例
   */
  public static createInternalServerError(
    message: string = 'Internal error.',
    details?: Record<string, unknown>,
  ): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}
