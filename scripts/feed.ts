import { z } from "zod";
import { Dynamic } from "./dynamic.js";
import { type DynamicType, FEED_DEFAULTS } from "./lib/constants.js";
import type { Credential } from "./lib/credential.js";
import { type HttpClient, type RawData, getDefaultClient, rawData } from "./lib/http.js";

const pageInfoSchema = z
  .object({
    items: z.array(z.object({ id_str: z.string() }).passthrough()),
  })
  .passthrough();

export interface DynamicPageParams {
  credential: Credential;
  /** Feed type filter. Wins over `hostMid` when both are given. */
  type?: DynamicType;
  /** Only this uploader's dynamics */
  hostMid?: number;
  page?: number;
  /** `offset` of the previous page */
  offset?: string;
  client?: HttpClient;
}

/**
 * One page of the dynamic feed. Returns bare handles; call `getInfo` on
 * the ones you need.
 */
export async function getDynamicPageInfo(params: DynamicPageParams): Promise<Dynamic[]> {
  const { credential, type, hostMid, page = 1, offset, client = getDefaultClient() } = params;

  const api = client.endpoints.dynamic.info.dynamic_page_info;
  const query = {
    timezone_offset: FEED_DEFAULTS.timezoneOffset,
    features: FEED_DEFAULTS.features,
    offset,
    page,
    ...(type ? { type } : hostMid ? { host_mid: hostMid } : {}),
  };

  const data = await client.request(api, { params: query, credential }, pageInfoSchema);
  return data.items.map((item) => new Dynamic(item.id_str, credential, client));
}

export type ListParams = Omit<DynamicPageParams, "type" | "hostMid">;

/** Everything the logged-in account follows */
export async function listBySelf(params: ListParams): Promise<Dynamic[]> {
  return getDynamicPageInfo(params);
}

export async function listByType(type: DynamicType, params: ListParams): Promise<Dynamic[]> {
  return getDynamicPageInfo({ ...params, type });
}

export async function listByUser(hostMid: number, params: ListParams): Promise<Dynamic[]> {
  return getDynamicPageInfo({ ...params, hostMid });
}

/** Followed users with dynamics not seen yet */
export async function getNewDynamicUsers(
  credential: Credential,
  client: HttpClient = getDefaultClient(),
): Promise<RawData> {
  credential.raiseForNoSessdata();

  const api = client.endpoints.dynamic.info.attention_new_dynamic;
  return client.request(api, { credential }, rawData);
}

/** Followed users streaming right now */
export async function getLiveUsers(
  credential: Credential,
  size = 10,
  client: HttpClient = getDefaultClient(),
): Promise<RawData> {
  credential.raiseForNoSessdata();

  const api = client.endpoints.dynamic.info.attention_live;
  return client.request(api, { params: { size }, credential }, rawData);
}

export async function getDynamicPageUpsInfo(
  credential: Credential,
  client: HttpClient = getDefaultClient(),
): Promise<RawData> {
  const api = client.endpoints.dynamic.info.dynamic_page_ups_info;
  return client.request(api, { credential }, rawData);
}
