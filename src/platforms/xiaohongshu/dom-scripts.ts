/// <reference lib="dom" />
import type { DomScript, ScriptArgs } from "../../services/page-driver";

// Each function below is serialized into the page and runs there, so every
// helper it needs is declared inside it.

export const readNoteCards: DomScript = {
  name: "xhs.readNoteCards",
  fn: (args: ScriptArgs) => {
    const clean = (value: string | null | undefined): string => (value ?? "").replace(/\s+/g, " ").trim();
    const limit = typeof args.limit === "number" ? args.limit : 50;
    const cards: Array<Record<string, string | null>> = [];

    for (const section of Array.from(document.querySelectorAll("section.note-item"))) {
      const link =
        section.querySelector<HTMLAnchorElement>("a.cover") ??
        section.querySelector<HTMLAnchorElement>('a[href*="/explore/"], a[href*="/search_result/"]');
      const href = link?.getAttribute("href") ?? "";
      let url: URL;
      try {
        url = new URL(href, window.location.origin);
      } catch {
        continue;
      }
      const id = url.pathname.split("/").filter((s) => s.length > 0).pop() ?? "";
      if (!id) continue;

      const authorLink = section.querySelector<HTMLAnchorElement>('a[href*="/user/profile/"]');
      const authorMatch = (authorLink?.getAttribute("href") ?? "").match(/\/user\/profile\/([A-Za-z0-9]+)/);

      cards.push({
        id,
        xsecToken: url.searchParams.get("xsec_token") ?? "",
        title: clean(section.querySelector(".footer .title")?.textContent),
        authorId: authorMatch?.[1] ?? "",
        authorName: clean(section.querySelector(".author-wrapper .name, .author .name")?.textContent),
        likes: clean(section.querySelector(".like-wrapper .count")?.textContent),
        cover: section.querySelector("img")?.getAttribute("src") ?? null,
      });
      if (cards.length >= limit) break;
    }
    return cards;
  },
};

export const readNoteDetail: DomScript = {
  name: "xhs.readNoteDetail",
  fn: () => {
    const clean = (value: string | null | undefined): string => (value ?? "").replace(/\s+/g, " ").trim();
    const container = document.querySelector("#noteContainer, .note-container");
    if (!container) return null;

    const readComment = (node: Element) => {
      const authorHref = node.querySelector(".author a")?.getAttribute("href") ?? "";
      return {
        id: (node.getAttribute("id") ?? "").replace(/^comment-/, ""),
        authorId: authorHref.match(/\/user\/profile\/([A-Za-z0-9]+)/)?.[1] ?? "",
        authorName: clean(node.querySelector(".author .name")?.textContent),
        content: clean(node.querySelector(".content")?.textContent),
        likes: clean(node.querySelector(".like .count")?.textContent),
      };
    };

    const comments = Array.from(container.querySelectorAll(".parent-comment")).flatMap((parent) => {
      const head = parent.querySelector(".comment-item:not(.comment-item-sub)");
      if (!head) return [];
      return [
        {
          ...readComment(head),
          replies: Array.from(parent.querySelectorAll(".reply-container .comment-item-sub")).map(readComment),
        },
      ];
    });

    const authorHref = container.querySelector(".author-wrapper a")?.getAttribute("href") ?? "";
    return {
      title: clean(container.querySelector("#detail-title")?.textContent),
      body: clean(container.querySelector("#detail-desc .note-text, #detail-desc")?.textContent),
      authorId: authorHref.match(/\/user\/profile\/([A-Za-z0-9]+)/)?.[1] ?? "",
      authorName: clean(container.querySelector(".author-wrapper .username")?.textContent),
      images: Array.from(container.querySelectorAll(".swiper-slide img, .media-container img"))
        .map((img) => img.getAttribute("src") ?? "")
        .filter((src, index, all) => src.length > 0 && all.indexOf(src) === index),
      tags: Array.from(container.querySelectorAll("#detail-desc a.tag")).map((a) => clean(a.textContent)),
      likes: clean(container.querySelector(".interact-container .like-wrapper .count")?.textContent),
      commentTotal: clean(document.querySelector(".comments-container .total")?.textContent),
      comments,
    };
  },
};

export const readUserProfile: DomScript = {
  name: "xhs.readUserProfile",
  fn: () => {
    const clean = (value: string | null | undefined): string => (value ?? "").replace(/\s+/g, " ").trim();
    const info = document.querySelector(".user-info");
    if (!info) return null;

    const counts = Array.from(document.querySelectorAll(".user-interactions > div")).map((node) =>
      clean(node.querySelector(".count")?.textContent)
    );

    const notes = Array.from(document.querySelectorAll("section.note-item")).flatMap((section) => {
      const href = section.querySelector("a.cover")?.getAttribute("href") ?? "";
      let url: URL;
      try {
        url = new URL(href, window.location.origin);
      } catch {
        return [];
      }
      const id = url.pathname.split("/").filter((s) => s.length > 0).pop() ?? "";
      if (!id) return [];
      return [
        {
          id,
          xsecToken: url.searchParams.get("xsec_token") ?? "",
          title: clean(section.querySelector(".footer .title")?.textContent),
          authorId: "",
          authorName: clean(section.querySelector(".author-wrapper .name")?.textContent),
          likes: clean(section.querySelector(".like-wrapper .count")?.textContent),
          cover: section.querySelector("img")?.getAttribute("src") ?? null,
        },
      ];
    });

    return {
      nickname: clean(info.querySelector(".user-name")?.textContent),
      bio: clean(info.querySelector(".user-desc")?.textContent),
      follows: counts[0] ?? "",
      fans: counts[1] ?? "",
      interactions: counts[2] ?? "",
      notes,
    };
  },
};

export const readMentions: DomScript = {
  name: "xhs.readMentions",
  fn: () => {
    const clean = (value: string | null | undefined): string => (value ?? "").replace(/\s+/g, " ").trim();
    return Array.from(document.querySelectorAll(".tabs-content-container .container")).map((node, index) => {
      const userHref = node.querySelector('a[href*="/user/profile/"]')?.getAttribute("href") ?? "";
      const noteHref = node.querySelector('a[href*="/explore/"]')?.getAttribute("href") ?? "";
      return {
        id: node.getAttribute("data-id") ?? String(index),
        kind: clean(node.querySelector(".interaction-hint")?.textContent),
        content: clean(node.querySelector(".interaction-content")?.textContent),
        fromName: clean(node.querySelector(".user-info a, .user-name")?.textContent),
        fromId: userHref.match(/\/user\/profile\/([A-Za-z0-9]+)/)?.[1] ?? "",
        postId: noteHref.match(/\/explore\/([A-Za-z0-9]+)/)?.[1] ?? null,
      };
    });
  },
};

export const checkNoteAccessible: DomScript = {
  name: "xhs.checkNoteAccessible",
  fn: (args: ScriptArgs) => {
    const keywords = String(args.keywords ?? "")
      .split("|")
      .filter((k) => k.length > 0);
    const wrapper = document.querySelector(String(args.wrapperSelector ?? ""));
    if (!wrapper) return { blocked: false, reason: null };

    const text = (wrapper.textContent ?? "").replace(/\s+/g, " ").trim();
    const keyword = keywords.find((k) => text.includes(k));
    return { blocked: true, reason: keyword ?? (text.slice(0, 80) || "note is not accessible") };
  },
};

export const findCommentIds: DomScript = {
  name: "xhs.findCommentIds",
  fn: (args: ScriptArgs) => {
    const normalize = (value: string | null | undefined): string =>
      (value ?? "").trim().replace(/\s+/g, " ").normalize("NFKC").toLowerCase();
    const wanted = normalize(String(args.content ?? ""));
    const scope = String(args.scope ?? ".parent-comment .comment-item");

    // One entry per matching item, in page order; "" when the item has no id yet.
    return Array.from(document.querySelectorAll(scope))
      .filter((node) => normalize(node.querySelector(".content")?.textContent) === wanted)
      .map((node) => (node.getAttribute("id") ?? "").replace(/^comment-/, ""));
  },
};
