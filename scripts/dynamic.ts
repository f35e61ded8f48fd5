import { z } from "zod";
import { REPOST_TEXT } from "./lib/constants.js";
import { Credential } from "./lib/credential.js";
import { ArgsException, ResponseException } from "./lib/errors.js";
import { type HttpClient, type RawData, getDefaultClient, rawData } from "./lib/http.js";
import { getTextData } from "./mention.js";
import { getSelfInfo } from "./user.js";

/**
 * Dynamic ids outgrow `Number.MAX_SAFE_INTEGER`, so they are kept as
 * decimal strings.
 */
export type DynamicId = string;

const detailSchema = z
  .object({
    card: z
      .object({
        card: z.string(),
        extend_json: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

/** `card` of the detail response with its JSON-string fields decoded */
export interface DynamicCard {
  [key: string]: unknown;
  card: unknown;
  extend_json: unknown;
}

export function toDynamicId(id: string | number | bigint): DynamicId {
  const value = String(id);
  if (!/^\d+$/.test(value)) {
    throw new ArgsException(`Invalid dynamic id: ${value}`);
  }
  return value;
}

function decodeEmbedded(raw: string, field: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ResponseException(`Dynamic field ${field} is not valid JSON.`, { cause: error });
  }
}

/** Handle on a single dynamic. Holds no fetched state. */
export class Dynamic {
  readonly credential: Credential;
  private readonly dynamicId: DynamicId;
  private readonly client: HttpClient;

  constructor(dynamicId: string | number | bigint, credential?: Credential, client?: HttpClient) {
    this.dynamicId = toDynamicId(dynamicId);
    this.credential = credential ?? new Credential();
    this.client = client ?? getDefaultClient();
  }

  getDynamicId(): DynamicId {
    return this.dynamicId;
  }

  async getInfo(): Promise<DynamicCard> {
    const api = this.client.endpoints.dynamic.info.detail;
    const data = await this.client.request(
      api,
      { params: { dynamic_id: this.dynamicId }, credential: this.credential },
      detailSchema,
    );

    return {
      ...data.card,
      card: decodeEmbedded(data.card.card, "card.card"),
      extend_json: decodeEmbedded(data.card.extend_json, "card.extend_json"),
    };
  }

  /**
   * @param offset - `offset` of the previous page; "0" for the first page
   */
  async getReposts(offset = "0"): Promise<RawData> {
    const api = this.client.endpoints.dynamic.info.repost;
    const params = {
      dynamic_id: this.dynamicId,
      offset: offset !== "0" ? offset : undefined,
    };
    return this.client.request(api, { params, credential: this.credential }, rawData);
  }

  async getLikes(pn = 1, ps = 30): Promise<RawData> {
    const api = this.client.endpoints.dynamic.info.likes;
    const params = { dynamic_id: this.dynamicId, pn, ps };
    return this.client.request(api, { params, credential: this.credential }, rawData);
  }

  async setLike(status = true): Promise<RawData> {
    this.credential.raiseForNoSessdata();
    this.credential.raiseForNoBiliJct();

    const api = this.client.endpoints.dynamic.operate.like;
    const self = await getSelfInfo(this.credential, this.client);

    const data = {
      dynamic_id: this.dynamicId,
      up: status ? 1 : 2,
      uid: self.mid,
    };
    return this.client.request(api, { data, credential: this.credential }, rawData);
  }

  async delete(): Promise<RawData> {
    this.credential.raiseForNoSessdata();

    const api = this.client.endpoints.dynamic.operate.delete;
    const data = { dynamic_id: this.dynamicId };
    return this.client.request(api, { data, credential: this.credential }, rawData);
  }

  async repost(text: string = REPOST_TEXT): Promise<RawData> {
    this.credential.raiseForNoSessdata();

    const api = this.client.endpoints.dynamic.operate.repost;
    const textData = await getTextData(text, { credential: this.credential, client: this.client });
    const data = { ...textData, dynamic_id: this.dynamicId };
    return this.client.request(api, { data, credential: this.credential }, rawData);
  }
}
