export class InvalidPatternError extends Error {
  readonly pattern: string;
  readonly reason: string;

  constructor(pattern: string, reason: string, context?: string) {
    const where = context ? `${context}: ` : "";
    super(`${where}invalid pattern '${pattern}' (${reason})`);
    this.name = "InvalidPatternError";
    this.pattern = pattern;
    this.reason = reason;
  }
}

export class DuplicateRenderOrderError extends Error {
  readonly renderOrder: number;

  constructor(renderOrder: number, first: string, second: string) {
    super(`Sections '${first}' and '${second}' share render order ${renderOrder}`);
    this.name = "DuplicateRenderOrderError";
    this.renderOrder = renderOrder;
  }
}
