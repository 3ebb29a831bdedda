import { logger } from "../core/logger";
import { env } from "../core/config";
import { normalizeContent } from "../core/normalize";
import { actionDelay, assertPacingRange, defaultPacing, type PacingRange, type RandomSource } from "../core/cooldown";
import { sleep, throwIfAborted } from "../core/retry";
import {
  AuthenticationRequiredError,
  EngineError,
  NotFoundError,
  OperationCancelledError,
  WorkflowFailedError,
} from "../core/errors";
import {
  describeCondition,
  type Condition,
  type StepAction,
  type WorkflowDefinition,
  type WorkflowStep,
} from "../domain/workflow";
import {
  isTerminal,
  validateTransition,
  type WorkflowStatus,
  type WorkflowTransition,
} from "../domain/workflow-state-machine";
import type { PageDriver } from "../services/page-driver";

export interface WorkflowReport {
  workflow: string;
  status: WorkflowStatus;
  stepsCompleted: string[];
  stepsSkipped: string[];
  transitions: WorkflowTransition[];
  captures: Record<string, string | null>;
  snapshots: Record<string, unknown>;
  startedAt: number;
  finishedAt: number | null;
}

export interface WorkflowRunOptions {
  signal?: AbortSignal;
  /** Page condition meaning "this session is logged out". Checked before every step. */
  loginRequired?: Condition;
  humanTimeoutMs?: number;
  onCapture?: (label: string, value: string | null) => void;
}

export interface WorkflowEngineOptions {
  pacing?: PacingRange;
  random?: RandomSource;
  pollMs?: number;
}

class StepFailure extends Error {}

function actionTarget(action: StepAction): string | null {
  switch (action.kind) {
    case "click":
    case "fill":
    case "upload":
    case "capture":
      return action.selector;
    default:
      return null;
  }
}

function countMatching(texts: readonly string[], text: string): number {
  const wanted = normalizeContent(text);
  return texts.filter((t) => normalizeContent(t) === wanted).length;
}

export async function evaluateCondition(page: PageDriver, condition: Condition): Promise<boolean> {
  switch (condition.kind) {
    case "visible":
      return page.isVisible(condition.selector);
    case "attached":
      return (await page.count(condition.selector)) > 0;
    case "absent":
      return (await page.count(condition.selector)) === 0;
    case "urlMatches":
      return condition.pattern.test(page.url());
    case "countAtLeast":
      return (await page.count(condition.selector)) >= condition.count;
    case "textPresent":
      return countMatching(await page.texts(condition.selector), condition.text) > 0;
    case "textCountAtLeast":
      return countMatching(await page.texts(condition.selector), condition.text) >= condition.count;
    case "stateReady":
      return (await page.readState(condition.path)) !== null;
    case "anyOf":
      for (const inner of condition.conditions) {
        if (await evaluateCondition(page, inner)) return true;
      }
      return false;
  }
}

/**
 * Runs write workflows as a state machine over their frozen step list. No
 * step or workflow is ever retried here. Cancellation is observed between
 * steps and during a human wait, never inside a step.
 */
export class WorkflowEngine {
  private readonly pacing: PacingRange;
  private readonly random: RandomSource;
  private readonly pollMs: number;

  constructor(options: WorkflowEngineOptions = {}) {
    this.pacing = options.pacing ?? defaultPacing();
    assertPacingRange(this.pacing);
    this.random = options.random ?? Math.random;
    this.pollMs = options.pollMs ?? env.EXTRACTION_POLL_MS;
  }

  async waitFor(page: PageDriver, condition: Condition, timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      throwIfAborted(signal, "wait");
      if (await evaluateCondition(page, condition)) return true;
      if (Date.now() >= deadline) return false;
      await sleep(Math.min(this.pollMs, Math.max(0, deadline - Date.now())), signal);
    }
  }

  async run<I>(page: PageDriver, workflow: WorkflowDefinition<I>, input: I, options: WorkflowRunOptions = {}): Promise<WorkflowReport> {
    const steps = workflow.plan(input);
    const report: WorkflowReport = {
      workflow: workflow.name,
      status: "pending",
      stepsCompleted: [],
      stepsSkipped: [],
      transitions: [],
      captures: {},
      snapshots: {},
      startedAt: Date.now(),
      finishedAt: null,
    };
    const { signal } = options;

    const transition = (to: WorkflowStatus, stepIndex: number | null, reason: string | null) =>
      this.transition(report, to, stepIndex, reason);

    const fail = (index: number, name: string, reason: string): WorkflowFailedError => {
      transition("failed", index, reason);
      logger.warn({ workflow: workflow.name, step: name, stepIndex: index, reason }, "Workflow step failed");
      return new WorkflowFailedError(workflow.name, index, name, reason, [...report.stepsCompleted]);
    };

    transition("running", 0, null);

    for (const [index, current] of steps.entries()) {
      try {
        throwIfAborted(signal, workflow.name);
      } catch (error) {
        transition("aborted", index, "cancelled");
        throw error;
      }

      if (index > 0) {
        try {
          await actionDelay(this.pacing, signal, this.random);
        } catch (error) {
          transition("aborted", index, "cancelled");
          throw error;
        }
      }

      if (workflow.requiresAuth && options.loginRequired && (await evaluateCondition(page, options.loginRequired))) {
        transition("aborted", index, "login required");
        throw new AuthenticationRequiredError(
          `Workflow "${workflow.name}" hit a login prompt before step ${index} (${current.name})`,
          "LOGIN_REQUIRED"
        );
      }

      const target = current.optional ? actionTarget(current.action) : null;
      if (target !== null && !(await this.waitFor(page, { kind: "attached", selector: target }, current.timeoutMs))) {
        report.stepsSkipped.push(current.name);
        logger.debug({ workflow: workflow.name, step: current.name, target }, "Optional step skipped, target never appeared");
        continue;
      }

      try {
        await this.executeStep(page, current, report, options, index);
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          if (!isTerminal(report.status)) transition("aborted", index, error.message);
          throw error;
        }
        if (error instanceof EngineError) {
          if (!isTerminal(report.status)) transition(error instanceof NotFoundError ? "failed" : "aborted", index, error.message);
          throw error;
        }
        throw fail(index, current.name, error instanceof Error ? error.message : String(error));
      }

      if (current.postcondition && !(await this.waitFor(page, current.postcondition, current.timeoutMs))) {
        throw fail(index, current.name, `postcondition ${describeCondition(current.postcondition)} did not hold within ${current.timeoutMs}ms`);
      }
      report.stepsCompleted.push(current.name);
    }

    if (workflow.verify) {
      try {
        throwIfAborted(signal, workflow.name);
      } catch (error) {
        transition("aborted", steps.length, "cancelled");
        throw error;
      }
      if (workflow.requiresAuth && options.loginRequired && (await evaluateCondition(page, options.loginRequired))) {
        transition("aborted", steps.length, "login required");
        throw new AuthenticationRequiredError(`Workflow "${workflow.name}" hit a login prompt before verification`, "LOGIN_REQUIRED");
      }
      const verification = workflow.verify(input, report.snapshots);
      if (!(await this.waitFor(page, verification.condition, verification.timeoutMs))) {
        throw fail(steps.length, "verify", `${verification.description} not observed within ${verification.timeoutMs}ms`);
      }
    }

    transition("succeeded", null, null);
    logger.info(
      { workflow: workflow.name, steps: report.stepsCompleted.length, skipped: report.stepsSkipped.length, durationMs: Date.now() - report.startedAt },
      "Workflow succeeded"
    );
    return report;
  }

  private async executeStep(
    page: PageDriver,
    current: WorkflowStep,
    report: WorkflowReport,
    options: WorkflowRunOptions,
    index: number,
  ): Promise<void> {
    const { action, timeoutMs } = current;

    switch (action.kind) {
      case "navigate":
        await page.goto(action.url, timeoutMs);
        return;
      case "click":
        await page.click(action.selector, timeoutMs);
        return;
      case "fill":
        await page.fill(action.selector, action.text, timeoutMs);
        return;
      case "type":
        await page.type(action.text, action.delayMs);
        return;
      case "press":
        await page.press(action.key);
        return;
      case "upload":
        await page.setInputFiles(action.selector, action.files, timeoutMs);
        return;
      case "removeOverlay":
        await page.removeElements(action.selector);
        return;
      case "capture": {
        if (!(await this.waitFor(page, { kind: "attached", selector: action.selector }, timeoutMs))) {
          throw new StepFailure(`${action.selector} never appeared`);
        }
        const value = await page.getAttribute(action.selector, action.attribute);
        report.captures[action.label] = value;
        options.onCapture?.(action.label, value);
        logger.info({ workflow: report.workflow, label: action.label }, "Captured page value");
        return;
      }
      case "snapshot":
        report.snapshots[action.label] = await page.run(action.script, action.args);
        return;
      case "scrollUntil":
        for (let attempt = 0; attempt < action.maxAttempts; attempt++) {
          if (await evaluateCondition(page, action.condition)) return;
          await page.scrollBy(action.stepPx);
          await sleep(this.pollMs);
        }
        if (await evaluateCondition(page, action.condition)) return;
        throw new StepFailure(`${describeCondition(action.condition)} not reached after ${action.maxAttempts} scrolls`);
      case "waitFor":
        if (!(await this.waitFor(page, action.condition, timeoutMs))) {
          throw new StepFailure(`${describeCondition(action.condition)} did not hold within ${timeoutMs}ms`);
        }
        return;
      case "waitForHuman":
        await this.waitForHuman(page, action.condition, action.pollMs, options, report, index);
        return;
      case "assert":
        if (await evaluateCondition(page, action.condition)) return;
        if (action.failAs === "NotFound") {
          throw new NotFoundError(action.message, "RESOURCE_INACCESSIBLE");
        }
        throw new StepFailure(action.message);
    }
  }

  private async waitForHuman(
    page: PageDriver,
    condition: Condition,
    pollMs: number,
    options: WorkflowRunOptions,
    report: WorkflowReport,
    index: number,
  ): Promise<void> {
    const timeoutMs = options.humanTimeoutMs ?? env.LOGIN_TIMEOUT_SECONDS * 1000;
    const deadline = Date.now() + timeoutMs;

    this.transition(report, "waiting_for_human", index, null);
    logger.info({ workflow: report.workflow, timeoutMs }, "Waiting for manual completion in the browser");

    for (;;) {
      throwIfAborted(options.signal, report.workflow);
      if (await evaluateCondition(page, condition)) break;
      if (Date.now() >= deadline) {
        throw new StepFailure(`${describeCondition(condition)} not observed within ${timeoutMs}ms of waiting for a human`);
      }
      await sleep(Math.min(pollMs, Math.max(0, deadline - Date.now())), options.signal);
    }

    this.transition(report, "running", index, "human completed");
  }

  private transition(report: WorkflowReport, to: WorkflowStatus, stepIndex: number | null, reason: string | null): void {
    validateTransition(report.status, to);
    report.transitions.push({ from: report.status, to, stepIndex, reason, at: Date.now() });
    logger.debug({ workflow: report.workflow, from: report.status, to, stepIndex, reason }, "Workflow transition");
    report.status = to;
    if (isTerminal(to)) report.finishedAt = Date.now();
  }
}
