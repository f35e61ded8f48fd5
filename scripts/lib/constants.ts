/** Request headers sent with every call */
export const HEADERS = {
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  referer: "https://www.bilibili.com",
} as const;

/** Timeouts (ms) */
export const TIMEOUTS = {
  request: 30_000,
} as const;

/** Feed type filter for the dynamic page */
export const DynamicType = {
  ALL: "all",
  ANIME: "pgc",
  ARTICLE: "article",
  VIDEO: "video",
} as const;
export type DynamicType = (typeof DynamicType)[keyof typeof DynamicType];

/** `scene` of a submitted dynamic */
export const SendDynamicType = {
  TEXT: 1,
  IMAGE: 2,
} as const;
export type SendDynamicType = (typeof SendDynamicType)[keyof typeof SendDynamicType];

/** `type` of a content fragment */
export const DynamicContentType = {
  TEXT: 1,
  AT: 2,
  VOTE: 4,
  EMOJI: 9,
} as const;
export type DynamicContentType = (typeof DynamicContentType)[keyof typeof DynamicContentType];

/** Client identification sent with every submission */
export const APP_META = {
  from: "create.dynamic.web",
  mobi_app: "web",
} as const;

/** The web client prefixes every vote with this line */
export const VOTE_TEXT = "我发起了一个投票";

/** Default repost caption */
export const REPOST_TEXT = "转发动态";

/** Live reservation card */
export const ATTACH_CARD = {
  type: 14,
  reserveSource: 1,
  reserveLottery: 0,
} as const;

export const MAX_IMAGES = 9;

/** Dynamic page request defaults */
export const FEED_DEFAULTS = {
  timezoneOffset: -480,
  features: "itemOpusStyle",
} as const;
