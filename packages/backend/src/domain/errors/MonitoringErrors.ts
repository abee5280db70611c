/**
 * 监控领域错误
 */

/**
 * 条件校验问题
 */
export interface ConditionIssue {
  path: string;
  message: string;
}

/**
 * 规则条件与其类型不匹配，或字段缺失
 */
export class InvalidRuleConditionError extends Error {
  constructor(
    public readonly ruleType: string,
    public readonly issues: ConditionIssue[],
  ) {
    super(
      `Invalid condition for rule_type "${ruleType}": ${issues
        .map((issue) => (issue.path ? `${issue.path} ${issue.message}` : issue.message))
        .join('; ')}`,
    );
    this.name = 'InvalidRuleConditionError';
    Object.setPrototypeOf(this, InvalidRuleConditionError.prototype);
  }
}

/**
 * 进程在扫描过程中消失或拒绝访问
 */
export class ProcessUnavailableError extends Error {
  constructor(
    public readonly pid: number,
    reason: string,
  ) {
    super(`Process ${pid} unavailable: ${reason}`);
    this.name = 'ProcessUnavailableError';
    Object.setPrototypeOf(this, ProcessUnavailableError.prototype);
  }
}

/**
 * 规则名称违反唯一约束
 */
export class DuplicateRuleNameError extends Error {
  constructor(public readonly ruleName: string) {
    super(`Alert rule name "${ruleName}" violates the unique constraint`);
    this.name = 'DuplicateRuleNameError';
    Object.setPrototypeOf(this, DuplicateRuleNameError.prototype);
  }
}
