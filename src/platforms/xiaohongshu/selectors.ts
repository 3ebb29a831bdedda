export const XHS_URLS = {
  HOME: "https://www.xiaohongshu.com",
  EXPLORE: "https://www.xiaohongshu.com/explore",
  NOTIFICATION: "https://www.xiaohongshu.com/notification",
  CREATOR_PUBLISH: "https://creator.xiaohongshu.com/publish/publish?source=official",
  searchResult(keyword: string): string {
    return `https://www.xiaohongshu.com/search_result?keyword=${encodeURIComponent(keyword)}&source=web_explore_feed`;
  },
  noteDetail(noteId: string, xsecToken: string): string {
    return `https://www.xiaohongshu.com/explore/${encodeURIComponent(noteId)}?xsec_token=${encodeURIComponent(xsecToken)}&xsec_source=pc_feed`;
  },
  userProfile(userId: string, xsecToken: string): string {
    return `https://www.xiaohongshu.com/user/profile/${encodeURIComponent(userId)}?xsec_token=${encodeURIComponent(xsecToken)}&xsec_source=pc_note`;
  },
};

export const XHS_STATE_PATHS = {
  FEEDS: "feed.feeds",
  SEARCH: "search.feeds",
  NOTE_DETAIL_MAP: "note.noteDetailMap",
  USER: "user",
  MENTIONS: "notification.notificationMap.mentions.messageList",
};

export const XHS_SELECTORS = {
  AUTH: {
    LOGGED_IN_MARKER: ".main-container .user .link-wrapper .channel",
    LOGIN_CONTAINER: ".login-container",
    QRCODE_IMAGE: ".login-container .qrcode-img",
    CREATOR_LOGIN_URL: /creator\.xiaohongshu\.com\/login/,
  },

  NAVIGATION: {
    SIDEBAR_PROFILE_LINK: "div.main-container li.user.side-bar-component a.link-wrapper",
  },

  FEEDS: {
    CONTAINER: ".feeds-container",
    NOTE_ITEM: "section.note-item",
  },

  DETAIL: {
    CONTAINER: "#noteContainer",
    TITLE: "#detail-title",
    DESC: "#detail-desc",
    INACCESSIBLE_WRAPPER: ".access-wrapper, .error-wrapper, .not-found-wrapper, .blocked-wrapper",
  },

  COMMENTS: {
    PARENT: ".parent-comment",
    TOP_LEVEL_ITEM: ".parent-comment .comment-item:not(.comment-item-sub)",
    ITEM_CONTENT: ".parent-comment .comment-item:not(.comment-item-sub) .content",
    END_MARKER: ".end-container",
    NO_COMMENTS: ".no-comments-text",
    TOTAL: ".comments-container .total",
    COMPOSER_TRIGGER: "div.input-box div.content-edit span",
    COMPOSER_INPUT: "div.input-box div.content-edit p.content-input",
    SUBMIT: "div.bottom button.submit",
    byId(commentId: string): string {
      return `#comment-${commentId}`;
    },
    replyTrigger(commentId: string): string {
      return `#comment-${commentId} .right .interactions .reply`;
    },
    repliesItemsOf(commentId: string): string {
      return `.parent-comment:has(#comment-${commentId}) .reply-container .comment-item-sub`;
    },
    repliesOf(commentId: string): string {
      return `.parent-comment:has(#comment-${commentId}) .reply-container .comment-item-sub .content`;
    },
  },

  PROFILE: {
    USER_INFO: ".user-info",
  },

  MENTIONS: {
    CONTAINER: ".tabs-content-container",
  },

  PUBLISH: {
    UPLOAD_AREA: "div.upload-content",
    CREATOR_TAB: "div.creator-tab",
    IMAGE_TAB_TEXT: "上传图文",
    POPOVER: "div.d-popover",
    FIRST_UPLOAD_INPUT: ".upload-input",
    UPLOAD_INPUT: 'input[type="file"]',
    IMAGE_PREVIEW: ".img-preview-area .pr",
    TITLE_INPUT: "div.d-input input",
    TITLE_LENGTH_ERROR: "div.title-container div.max_suffix",
    BODY_EDITOR: "div.ql-editor",
    TOPIC_SUGGESTION: "#creator-editor-topic-container .item",
    BODY_LENGTH_ERROR: "div.edit-container div.length-error",
    SCHEDULE_SWITCH: ".post-time-wrapper .d-switch",
    SCHEDULE_INPUT: ".date-picker-container input",
    SUBMIT: ".publish-page-publish-btn button.bg-red",
    SUCCESS_CONTAINER: ".publish-success, .success-container",
    SUCCESS_URL: /\/publish\/success/,
  },
};

export const XHS_BLOCKED_KEYWORDS = [
  "当前笔记暂时无法浏览",
  "该内容因违规已被删除",
  "该笔记已被删除",
  "内容不存在",
  "笔记不存在",
  "已失效",
  "私密笔记",
  "仅作者可见",
  "因用户设置，你无法查看",
  "因违规无法查看",
];

export const XHS_BLOCKED_URL_PATTERNS: readonly RegExp[] = [
  /\/website-login\/captcha/i,
  /\/website-login\/error/i,
  /\/web-login\/captcha/i,
];

export const XHS_LIMITS = {
  TITLE_MAX_LENGTH: 20,
  BODY_MAX_LENGTH: 1000,
  MAX_TAGS: 10,
};

export const XHS_TIMEOUTS = {
  NAVIGATION_MS: 60_000,
  UPLOAD_PREVIEW_MS: 60_000,
  POPOVER_MS: 2_000,
  TOPIC_SUGGESTION_MS: 3_000,
  LOGIN_POLL_MS: 500,
};
