import type { InvariantViolation } from "./invariants";

export type IgnoredReason =
  | "not-empty"
  | "first-block"
  | "no-change"
  | "divider"
  | "not-checkbox"
  | "inside-subtree"
  | "last-block";

export type EditResult =
  | { status: "applied"; createdBlockId?: string; removedBlockId?: string; cursor?: number }
  | { status: "clamped"; requested: number; applied: number }
  | { status: "not-found"; blockId: string }
  | { status: "ignored"; reason: IgnoredReason };

export const applied = (
  details: Omit<Extract<EditResult, { status: "applied" }>, "status"> = {}
): EditResult => ({ status: "applied", ...details });

export const clamped = (requested: number, appliedLevel: number): EditResult => ({
  status: "clamped",
  requested,
  applied: appliedLevel
});

export const notFound = (blockId: string): EditResult => ({ status: "not-found", blockId });

export const ignored = (reason: IgnoredReason): EditResult => ({ status: "ignored", reason });

export class InvariantViolationError extends Error {
  readonly violations: readonly InvariantViolation[];

  constructor(violations: readonly InvariantViolation[]) {
    const kinds = Array.from(new Set(violations.map((violation) => violation.kind)));
    super(`invariant-violation: ${kinds.join(", ")}`);
    this.name = "InvariantViolationError";
    this.violations = violations;
  }
}
