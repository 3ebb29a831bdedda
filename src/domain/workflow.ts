import type { DomScript, ScriptArgs } from "../services/page-driver";

/**
 * Observable page conditions. Every postcondition, wait and verification in a
 * workflow is one of these, so the engine can evaluate them against any page
 * driver without platform knowledge.
 */
export type Condition =
  | { kind: "visible"; selector: string }
  | { kind: "attached"; selector: string }
  | { kind: "absent"; selector: string }
  | { kind: "urlMatches"; pattern: RegExp }
  | { kind: "countAtLeast"; selector: string; count: number }
  | { kind: "textPresent"; selector: string; text: string }
  /** At least `count` nodes under `selector` whose normalized text equals `text`. */
  | { kind: "textCountAtLeast"; selector: string; text: string; count: number }
  | { kind: "stateReady"; path: string }
  | { kind: "anyOf"; conditions: readonly Condition[] };

export type StepAction =
  | { kind: "navigate"; url: string }
  | { kind: "click"; selector: string }
  | { kind: "fill"; selector: string; text: string }
  | { kind: "type"; text: string; delayMs: number }
  | { kind: "press"; key: string }
  | { kind: "upload"; selector: string; files: readonly string[] }
  | { kind: "removeOverlay"; selector: string }
  | { kind: "capture"; selector: string; attribute: string; label: string }
  | { kind: "snapshot"; script: DomScript; args: ScriptArgs; label: string }
  | { kind: "scrollUntil"; condition: Condition; stepPx: number; maxAttempts: number }
  | { kind: "waitFor"; condition: Condition }
  | { kind: "waitForHuman"; condition: Condition; pollMs: number }
  | { kind: "assert"; condition: Condition; failAs?: "NotFound"; message: string };

export interface WorkflowStep {
  readonly name: string;
  readonly action: StepAction;
  readonly postcondition?: Condition;
  readonly timeoutMs: number;
  /** Skip instead of failing when the step's action cannot start, e.g. its target never appears. */
  readonly optional?: boolean;
}

export interface WorkflowVerification {
  readonly condition: Condition;
  readonly timeoutMs: number;
  readonly description: string;
}

export interface WorkflowDefinition<I> {
  readonly name: string;
  /** Login runs before a session is authenticated, so it opts out of the guard. */
  readonly requiresAuth: boolean;
  plan(input: I): readonly WorkflowStep[];
  /** `snapshots` holds what the run's snapshot steps recorded before the write. */
  verify?(input: I, snapshots: Readonly<Record<string, unknown>>): WorkflowVerification;
}

export function step(definition: WorkflowStep): WorkflowStep {
  return Object.freeze({ ...definition });
}

export function describeCondition(condition: Condition): string {
  switch (condition.kind) {
    case "visible":
    case "attached":
    case "absent":
      return `${condition.kind}(${condition.selector})`;
    case "urlMatches":
      return `urlMatches(${condition.pattern.source})`;
    case "countAtLeast":
      return `countAtLeast(${condition.selector}, ${condition.count})`;
    case "textPresent":
      return `textPresent(${condition.selector})`;
    case "textCountAtLeast":
      return `textCountAtLeast(${condition.selector}, ${condition.count})`;
    case "stateReady":
      return `stateReady(${condition.path})`;
    case "anyOf":
      return `anyOf(${condition.conditions.map(describeCondition).join(", ")})`;
  }
}
