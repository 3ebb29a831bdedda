import type { PlatformDefinition } from "../definition";
import {
  checkNoteAccessible,
  findCommentIds,
  readMentions,
  readNoteCards,
  readNoteDetail,
  readUserProfile,
} from "./dom-scripts";
import {
  parseDomCards,
  parseDomDetail,
  parseDomMentions,
  parseDomProfile,
  parseFeedEntries,
  parseInaccessible,
  parseMentions,
  parseNoteDetailEntry,
  parseUserIdFromHref,
  parseUserState,
} from "./parsers";
import {
  XHS_BLOCKED_KEYWORDS,
  XHS_BLOCKED_URL_PATTERNS,
  XHS_LIMITS,
  XHS_SELECTORS,
  XHS_STATE_PATHS,
  XHS_URLS,
} from "./selectors";
import { XHS_LOGGED_IN, XHS_LOGIN_REQUIRED, commentWorkflow, loginWorkflow, publishWorkflow, replyWorkflow } from "./workflows";

export const xiaohongshu: PlatformDefinition = {
  platform: "xiaohongshu",

  auth: {
    probeUrl: XHS_URLS.EXPLORE,
    loggedIn: XHS_LOGGED_IN,
    loginRequired: XHS_LOGIN_REQUIRED,
  },

  limits: {
    titleMaxLength: XHS_LIMITS.TITLE_MAX_LENGTH,
    bodyMaxLength: XHS_LIMITS.BODY_MAX_LENGTH,
    maxTags: XHS_LIMITS.MAX_TAGS,
  },

  blockedUrlPatterns: XHS_BLOCKED_URL_PATTERNS,

  reads: {
    feeds: () => ({
      name: "xiaohongshu.feeds",
      url: XHS_URLS.EXPLORE,
      readyMarker: XHS_SELECTORS.FEEDS.NOTE_ITEM,
      statePath: XHS_STATE_PATHS.FEEDS,
      fromState: parseFeedEntries,
      domScript: readNoteCards,
      domArgs: { limit: 100 },
      fromDom: parseDomCards,
    }),

    search: (keyword) => ({
      name: "xiaohongshu.search",
      url: XHS_URLS.searchResult(keyword),
      readyMarker: XHS_SELECTORS.FEEDS.NOTE_ITEM,
      statePath: XHS_STATE_PATHS.SEARCH,
      fromState: parseFeedEntries,
      domScript: readNoteCards,
      domArgs: { limit: 100 },
      fromDom: parseDomCards,
    }),

    postDetail: (id, token, options) => ({
      name: "xiaohongshu.postDetail",
      url: XHS_URLS.noteDetail(id, token),
      readyMarker: XHS_SELECTORS.DETAIL.CONTAINER,
      statePath: `${XHS_STATE_PATHS.NOTE_DETAIL_MAP}.${id}`,
      fromState: (raw) => parseNoteDetailEntry(raw, id, token),
      domScript: readNoteDetail,
      fromDom: (raw) => parseDomDetail(raw, id, token),
      inaccessible: {
        script: checkNoteAccessible,
        args: {
          wrapperSelector: XHS_SELECTORS.DETAIL.INACCESSIBLE_WRAPPER,
          keywords: XHS_BLOCKED_KEYWORDS.join("|"),
        },
        parse: parseInaccessible,
      },
      missingIsNotFound: true,
      scroll: options.loadAllComments
        ? {
            itemSelector: XHS_SELECTORS.COMMENTS.PARENT,
            endMarker: `${XHS_SELECTORS.COMMENTS.END_MARKER}, ${XHS_SELECTORS.COMMENTS.NO_COMMENTS}`,
            targetCount: options.maxComments,
            stepPx: 800,
            maxAttempts: 50,
          }
        : undefined,
    }),

    userProfile: (userId, url) => ({
      name: "xiaohongshu.userProfile",
      url,
      readyMarker: XHS_SELECTORS.PROFILE.USER_INFO,
      statePath: XHS_STATE_PATHS.USER,
      fromState: (raw) => parseUserState(raw, userId),
      domScript: readUserProfile,
      fromDom: (raw) => parseDomProfile(raw, userId),
      missingIsNotFound: true,
    }),

    userProfileUrl: (userId, token) => XHS_URLS.userProfile(userId, token),

    mentions: () => ({
      name: "xiaohongshu.mentions",
      url: XHS_URLS.NOTIFICATION,
      readyMarker: XHS_SELECTORS.MENTIONS.CONTAINER,
      statePath: XHS_STATE_PATHS.MENTIONS,
      fromState: parseMentions,
      domScript: readMentions,
      fromDom: parseDomMentions,
    }),
  },

  self: {
    url: XHS_URLS.EXPLORE,
    profileLink: XHS_SELECTORS.NAVIGATION.SIDEBAR_PROFILE_LINK,
    parseUserId: parseUserIdFromHref,
  },

  workflows: {
    login: loginWorkflow,
    publish: publishWorkflow,
    comment: commentWorkflow,
    reply: replyWorkflow,
  },

  scripts: {
    findCommentIds,
    commentScope: XHS_SELECTORS.COMMENTS.TOP_LEVEL_ITEM,
    replyScope: (commentId) => XHS_SELECTORS.COMMENTS.repliesItemsOf(commentId),
  },
};

export { XHS_URLS, XHS_SELECTORS, XHS_STATE_PATHS } from "./selectors";
