import { ATTACH_CARD, DynamicContentType, SendDynamicType, VOTE_TEXT } from "./lib/constants.js";
import type { HttpClient } from "./lib/http.js";
import type { Picture } from "./lib/picture.js";
import { type TopicLike, toTopicId } from "./topic.js";
import { type UserLike, toUid } from "./user.js";
import { Vote, type VoteLike } from "./vote.js";

export interface ContentFragment {
  biz_id: string | number;
  type: DynamicContentType;
  raw_text: string;
}

export interface PicDescriptor {
  img_src: string;
  img_width: number;
  img_height: number;
}

export interface AttachCard {
  type: number;
  biz_id: number;
  reserve_source: number;
  reserve_lottery: number;
}

export interface TopicRef {
  id: number;
}

export interface DynamicOptions {
  up_choose_comment?: 1;
  close_comment?: 1;
}

/**
 * Collects the pieces of a dynamic before `sendDynamic`. Append-only and
 * offline, except `addVote` which looks up the vote title.
 */
export class DynamicBuilder {
  private readonly contents: ContentFragment[] = [];
  private readonly pics: PicDescriptor[] = [];
  private attachCard: AttachCard | null = null;
  private topic: TopicRef | null = null;
  private readonly options: DynamicOptions = {};
  private readonly client?: HttpClient;

  /** `client` is used for vote lookups in `addVote`. */
  constructor(client?: HttpClient) {
    this.client = client;
  }

  addText(text: string): this {
    this.contents.push({ biz_id: "", type: DynamicContentType.TEXT, raw_text: text });
    return this;
  }

  addMention(user: UserLike): this {
    const uid = toUid(user);
    this.contents.push({ biz_id: uid, type: DynamicContentType.AT, raw_text: `@${uid}` });
    return this;
  }

  addEmoji(emojiName: string): this {
    this.contents.push({ biz_id: "", type: DynamicContentType.EMOJI, raw_text: emojiName });
    return this;
  }

  async addVote(vote: VoteLike): Promise<this> {
    const handle = typeof vote === "number" ? new Vote(vote, undefined, this.client) : vote;
    const title = await handle.getTitle();

    // Same leading line the web client inserts
    this.addText(VOTE_TEXT);
    // vote ids go over the wire as strings
    this.contents.push({ biz_id: String(handle.voteId), type: DynamicContentType.VOTE, raw_text: title });
    return this;
  }

  /** `image` must already be uploaded, see `uploadImage`. */
  addImage(image: Picture): this {
    this.pics.push({ img_src: image.url, img_width: image.width, img_height: image.height });
    return this;
  }

  /** Live reservation card; `oid` comes from creating the reservation. */
  setAttachCard(oid: number): this {
    this.attachCard = {
      type: ATTACH_CARD.type,
      biz_id: oid,
      reserve_source: ATTACH_CARD.reserveSource,
      reserve_lottery: ATTACH_CARD.reserveLottery,
    };
    return this;
  }

  setTopic(topic: TopicLike): this {
    this.topic = { id: toTopicId(topic) };
    return this;
  }

  setOptions(upChooseComment = false, closeComment = false): this {
    if (upChooseComment) this.options.up_choose_comment = 1;
    if (closeComment) this.options.close_comment = 1;
    return this;
  }

  getTransmissionScene(): SendDynamicType {
    return this.pics.length > 0 ? SendDynamicType.IMAGE : SendDynamicType.TEXT;
  }

  getContents(): readonly ContentFragment[] {
    return this.contents;
  }

  getPics(): readonly PicDescriptor[] {
    return this.pics;
  }

  getAttachCard(): AttachCard | null {
    return this.attachCard;
  }

  getTopic(): TopicRef | null {
    return this.topic;
  }

  getOptions(): Readonly<DynamicOptions> {
    return this.options;
  }
}
