import { randomUUID } from "node:crypto";

/** Called once per parsed row; values must be unique within a parse. */
export interface IdGenerator {
  generateId(): string;
}

export class RandomIdGenerator implements IdGenerator {
  generateId(): string {
    return randomUUID();
  }
}

/** `work-1`, `work-2`, ... — reproducible output for dry runs and tests */
export class SequentialIdGenerator implements IdGenerator {
  private next = 1;

  constructor(private readonly prefix = "work") {}

  generateId(): string {
    return `${this.prefix}-${this.next++}`;
  }
}
