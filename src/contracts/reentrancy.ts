import { ReentrancyError } from "../errors";

/**
 * Held/released flag guarding an engine's state-mutating entry points.
 */
export class ReentrancyGuard {
  private entered = false;
  readonly contractId: string;

  constructor(contractId: string) {
    this.contractId = contractId;
  }

  run<T>(fn: () => T): T {
    if (this.entered) throw new ReentrancyError(this.contractId);
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
