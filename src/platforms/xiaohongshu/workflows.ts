import { env } from "../../core/config";
import { step, type Condition, type WorkflowDefinition, type WorkflowStep } from "../../domain/workflow";
import type { ValidPublishContent } from "../../domain/models";
import { EXISTING_IDS_SNAPSHOT, idList, type ValidCommentInput, type ValidReplyInput } from "../definition";
import { findCommentIds } from "./dom-scripts";
import { XHS_SELECTORS, XHS_TIMEOUTS, XHS_URLS } from "./selectors";

const { AUTH, DETAIL, COMMENTS, PUBLISH } = XHS_SELECTORS;

const stepTimeout = () => env.STEP_TIMEOUT_MS;
const readbackTimeout = () => env.READBACK_TIMEOUT_MS;

export const XHS_LOGIN_REQUIRED: Condition = {
  kind: "anyOf",
  conditions: [
    { kind: "visible", selector: AUTH.LOGIN_CONTAINER },
    { kind: "urlMatches", pattern: AUTH.CREATOR_LOGIN_URL },
  ],
};

export const XHS_LOGGED_IN: Condition = { kind: "attached", selector: AUTH.LOGGED_IN_MARKER };

export function formatScheduleTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export const loginWorkflow: WorkflowDefinition<void> = {
  name: "xiaohongshu.login",
  requiresAuth: false,
  plan: () =>
    Object.freeze([
      step({
        name: "open-explore",
        action: { kind: "navigate", url: XHS_URLS.EXPLORE },
        postcondition: {
          kind: "anyOf",
          conditions: [XHS_LOGGED_IN, { kind: "visible", selector: AUTH.QRCODE_IMAGE }],
        },
        timeoutMs: XHS_TIMEOUTS.NAVIGATION_MS,
      }),
      step({
        name: "read-qrcode",
        action: { kind: "capture", selector: AUTH.QRCODE_IMAGE, attribute: "src", label: "qrCode" },
        timeoutMs: XHS_TIMEOUTS.POPOVER_MS,
        optional: true,
      }),
      step({
        name: "wait-for-scan",
        action: { kind: "waitForHuman", condition: XHS_LOGGED_IN, pollMs: XHS_TIMEOUTS.LOGIN_POLL_MS },
        timeoutMs: stepTimeout(),
      }),
    ]),
};

function openNoteSteps(input: ValidCommentInput): WorkflowStep[] {
  return [
    step({
      name: "open-note",
      action: { kind: "navigate", url: XHS_URLS.noteDetail(input.postId, input.xsecToken) },
      postcondition: {
        kind: "anyOf",
        conditions: [
          { kind: "attached", selector: DETAIL.CONTAINER },
          { kind: "attached", selector: DETAIL.INACCESSIBLE_WRAPPER },
        ],
      },
      timeoutMs: XHS_TIMEOUTS.NAVIGATION_MS,
    }),
    step({
      name: "check-accessible",
      action: {
        kind: "assert",
        condition: { kind: "absent", selector: DETAIL.INACCESSIBLE_WRAPPER },
        failAs: "NotFound",
        message: `Note ${input.postId} is deleted, private or blocked`,
      },
      timeoutMs: stepTimeout(),
    }),
  ];
}

// Records the items already carrying this text, so verification needs one more.
function composeSteps(content: string, scope: string): WorkflowStep[] {
  return [
    step({
      name: "record-existing",
      action: { kind: "snapshot", script: findCommentIds, args: { scope, content }, label: EXISTING_IDS_SNAPSHOT },
      timeoutMs: stepTimeout(),
    }),
    step({
      name: "fill-content",
      action: { kind: "fill", selector: COMMENTS.COMPOSER_INPUT, text: content },
      timeoutMs: stepTimeout(),
    }),
    step({
      name: "submit",
      action: { kind: "click", selector: COMMENTS.SUBMIT },
      timeoutMs: stepTimeout(),
    }),
  ];
}

export const commentWorkflow: WorkflowDefinition<ValidCommentInput> = {
  name: "xiaohongshu.comment",
  requiresAuth: true,
  plan: (input) =>
    Object.freeze([
      ...openNoteSteps(input),
      step({
        name: "open-composer",
        action: { kind: "click", selector: COMMENTS.COMPOSER_TRIGGER },
        postcondition: { kind: "visible", selector: COMMENTS.COMPOSER_INPUT },
        timeoutMs: stepTimeout(),
      }),
      ...composeSteps(input.content, COMMENTS.TOP_LEVEL_ITEM),
    ]),
  verify: (input, snapshots) => ({
    condition: {
      kind: "textCountAtLeast",
      selector: COMMENTS.ITEM_CONTENT,
      text: input.content,
      count: idList(snapshots[EXISTING_IDS_SNAPSHOT]).length + 1,
    },
    timeoutMs: readbackTimeout(),
    description: "submitted comment in the comment list",
  }),
};

export const replyWorkflow: WorkflowDefinition<ValidReplyInput> = {
  name: "xiaohongshu.reply",
  requiresAuth: true,
  plan: (input) =>
    Object.freeze([
      ...openNoteSteps(input),
      step({
        name: "locate-comment",
        action: {
          kind: "scrollUntil",
          condition: { kind: "attached", selector: COMMENTS.byId(input.commentId) },
          stepPx: 800,
          maxAttempts: 30,
        },
        timeoutMs: stepTimeout(),
      }),
      step({
        name: "open-reply",
        action: { kind: "click", selector: COMMENTS.replyTrigger(input.commentId) },
        postcondition: { kind: "visible", selector: COMMENTS.COMPOSER_INPUT },
        timeoutMs: stepTimeout(),
      }),
      ...composeSteps(input.content, COMMENTS.repliesItemsOf(input.commentId)),
    ]),
  verify: (input, snapshots) => ({
    condition: {
      kind: "textCountAtLeast",
      selector: COMMENTS.repliesOf(input.commentId),
      text: input.content,
      count: idList(snapshots[EXISTING_IDS_SNAPSHOT]).length + 1,
    },
    timeoutMs: readbackTimeout(),
    description: `submitted reply under comment ${input.commentId}`,
  }),
};

export const publishWorkflow: WorkflowDefinition<ValidPublishContent> = {
  name: "xiaohongshu.publish",
  requiresAuth: true,
  plan: (content) => {
    const steps: WorkflowStep[] = [
      step({
        name: "open-publish-page",
        action: { kind: "navigate", url: XHS_URLS.CREATOR_PUBLISH },
        postcondition: { kind: "visible", selector: PUBLISH.UPLOAD_AREA },
        timeoutMs: XHS_TIMEOUTS.NAVIGATION_MS,
      }),
      step({
        name: "dismiss-popover",
        action: { kind: "removeOverlay", selector: PUBLISH.POPOVER },
        timeoutMs: XHS_TIMEOUTS.POPOVER_MS,
      }),
      step({
        name: "choose-image-note",
        action: { kind: "click", selector: `${PUBLISH.CREATOR_TAB}:has-text("${PUBLISH.IMAGE_TAB_TEXT}")` },
        postcondition: { kind: "attached", selector: PUBLISH.FIRST_UPLOAD_INPUT },
        timeoutMs: stepTimeout(),
      }),
    ];

    content.mediaPaths.forEach((path, index) => {
      steps.push(
        step({
          name: `upload-image-${index + 1}`,
          action: {
            kind: "upload",
            selector: index === 0 ? PUBLISH.FIRST_UPLOAD_INPUT : PUBLISH.UPLOAD_INPUT,
            files: [path],
          },
          postcondition: { kind: "countAtLeast", selector: PUBLISH.IMAGE_PREVIEW, count: index + 1 },
          timeoutMs: XHS_TIMEOUTS.UPLOAD_PREVIEW_MS,
        })
      );
    });

    steps.push(
      step({
        name: "fill-title",
        action: { kind: "fill", selector: PUBLISH.TITLE_INPUT, text: content.title },
        timeoutMs: stepTimeout(),
      }),
      step({
        name: "check-title-length",
        action: {
          kind: "assert",
          condition: { kind: "absent", selector: PUBLISH.TITLE_LENGTH_ERROR },
          message: "platform rejected the title length",
        },
        timeoutMs: stepTimeout(),
      }),
      step({
        name: "fill-body",
        action: { kind: "fill", selector: PUBLISH.BODY_EDITOR, text: content.body },
        timeoutMs: stepTimeout(),
      })
    );

    if (content.tags.length > 0) {
      steps.push(
        step({
          name: "focus-body-end",
          action: { kind: "click", selector: PUBLISH.BODY_EDITOR },
          timeoutMs: stepTimeout(),
        }),
        step({ name: "move-to-end", action: { kind: "press", key: "End" }, timeoutMs: stepTimeout() }),
        step({ name: "new-line", action: { kind: "press", key: "Enter" }, timeoutMs: stepTimeout() })
      );
      content.tags.forEach((tag, index) => {
        steps.push(
          step({
            name: `type-tag-${index + 1}`,
            action: { kind: "type", text: `#${tag}`, delayMs: 50 },
            timeoutMs: stepTimeout(),
          }),
          step({
            name: `pick-tag-${index + 1}`,
            action: { kind: "click", selector: PUBLISH.TOPIC_SUGGESTION },
            timeoutMs: XHS_TIMEOUTS.TOPIC_SUGGESTION_MS,
            optional: true,
          })
        );
      });
    }

    steps.push(
      step({
        name: "check-body-length",
        action: {
          kind: "assert",
          condition: { kind: "absent", selector: PUBLISH.BODY_LENGTH_ERROR },
          message: "platform rejected the body length",
        },
        timeoutMs: stepTimeout(),
      })
    );

    if (content.scheduleAt) {
      steps.push(
        step({
          name: "enable-schedule",
          action: { kind: "click", selector: PUBLISH.SCHEDULE_SWITCH },
          postcondition: { kind: "visible", selector: PUBLISH.SCHEDULE_INPUT },
          timeoutMs: stepTimeout(),
        }),
        step({
          name: "fill-schedule",
          action: { kind: "fill", selector: PUBLISH.SCHEDULE_INPUT, text: formatScheduleTime(content.scheduleAt) },
          timeoutMs: stepTimeout(),
        })
      );
    }

    steps.push(
      step({
        name: "submit",
        action: { kind: "click", selector: PUBLISH.SUBMIT },
        timeoutMs: stepTimeout(),
      })
    );

    return Object.freeze(steps);
  },
  verify: () => ({
    condition: {
      kind: "anyOf",
      conditions: [
        { kind: "urlMatches", pattern: PUBLISH.SUCCESS_URL },
        { kind: "attached", selector: PUBLISH.SUCCESS_CONTAINER },
      ],
    },
    timeoutMs: readbackTimeout(),
    description: "publish confirmation page",
  }),
};
