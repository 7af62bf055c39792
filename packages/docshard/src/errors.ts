export class DocshardConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DocshardConfigError";
  }
}

export class ShardChainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShardChainError";
  }
}
