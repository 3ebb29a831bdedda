import type {
  AuthState,
  CommentInput,
  FeedItem,
  Mention,
  Platform,
  PostDetail,
  PublishContent,
  PublishResult,
  ReplyInput,
  SearchResult,
  UserProfile,
  WriteResult,
} from "../domain/models";

export interface OperationOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface LoginOptions extends OperationOptions {
  humanTimeoutMs?: number;
  /** Called with the QR code image source as soon as the login page shows one. */
  onQrCode?: (src: string) => void;
}

export interface LoginResult {
  alreadyLoggedIn: boolean;
  qrCode: string | null;
  cookieCount: number;
  savedAt: number;
}

export interface PostDetailOptions extends OperationOptions {
  loadAllComments?: boolean;
  maxComments?: number;
}

/**
 * The capability set every platform offers. Implementations are data-driven
 * (see WebPlatformAdapter); nothing here knows about a particular site.
 */
export interface PlatformAdapter {
  readonly platform: Platform;

  login(options?: LoginOptions): Promise<LoginResult>;

  checkLogin(options?: OperationOptions): Promise<AuthState>;

  getFeeds(limit: number, options?: OperationOptions): Promise<FeedItem[]>;

  search(keyword: string, limit: number, options?: OperationOptions): Promise<SearchResult[]>;

  getPostDetail(id: string, token: string, options?: PostDetailOptions): Promise<PostDetail>;

  getUserProfile(userId: string, token: string, options?: OperationOptions): Promise<UserProfile>;

  getMyProfile(options?: OperationOptions): Promise<UserProfile>;

  getMentions(limit: number, options?: OperationOptions): Promise<Mention[]>;

  publish(content: PublishContent, options?: OperationOptions): Promise<PublishResult>;

  comment(input: CommentInput, options?: OperationOptions): Promise<WriteResult>;

  reply(input: ReplyInput, options?: OperationOptions): Promise<WriteResult>;
}
