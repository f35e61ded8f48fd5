export { DynamicBuilder } from "./builder.js";
export { Dynamic, toDynamicId } from "./dynamic.js";
export {
  getDynamicPageInfo,
  getDynamicPageUpsInfo,
  getLiveUsers,
  getNewDynamicUsers,
  listBySelf,
  listByType,
  listByUser,
} from "./feed.js";
export { getTextData, parseAt } from "./mention.js";
export { buildDynamicRequest, sendDynamic, uploadImage } from "./post.js";
export { deleteSchedule, getSchedulesList, sendScheduleNow } from "./schedule.js";
export { Topic } from "./topic.js";
export { User, getSelfInfo, nameToUid } from "./user.js";
export { Vote } from "./vote.js";
export { DynamicContentType, DynamicType, SendDynamicType } from "./lib/constants.js";
export { Credential } from "./lib/credential.js";
export { loadEndpointTable, parseEndpointTable } from "./lib/endpoints.js";
export { getClientConfig } from "./lib/env.js";
export * from "./lib/errors.js";
export { HttpClient, getDefaultClient } from "./lib/http.js";
export { logger, setLogLevel } from "./lib/logger.js";
export { pictureFromUpload } from "./lib/picture.js";

export type {
  AttachCard,
  ContentFragment,
  DynamicOptions,
  PicDescriptor,
  TopicRef,
} from "./builder.js";
export type { DynamicCard, DynamicId } from "./dynamic.js";
export type { DynamicPageParams, ListParams } from "./feed.js";
export type { AtControl, AtParseResult, MentionOptions, TextData } from "./mention.js";
export type { CreateDynamicRequest } from "./post.js";
export type { TopicLike } from "./topic.js";
export type { NameToUidResult, UserInfo, UserLike } from "./user.js";
export type { VoteInfo, VoteLike } from "./vote.js";
export type { CredentialInit } from "./lib/credential.js";
export type { Endpoint, EndpointTable } from "./lib/endpoints.js";
export type { ClientConfig, LogLevel } from "./lib/env.js";
export type { FilePart, HttpClientOptions, QueryParams, RawData, RequestOptions } from "./lib/http.js";
export type { Picture, UploadImageResult } from "./lib/picture.js";
