import { z } from "zod";
import { Credential } from "./lib/credential.js";
import { type HttpClient, getDefaultClient } from "./lib/http.js";

const nameToUidSchema = z
  .object({
    uid_list: z
      .array(z.object({ name: z.string(), uid: z.union([z.string(), z.number()]) }))
      .nullable()
      .optional(),
  })
  .passthrough();

export type NameToUidResult = z.infer<typeof nameToUidSchema>;

const userInfoSchema = z
  .object({
    mid: z.number(),
    name: z.string(),
  })
  .passthrough();

export type UserInfo = z.infer<typeof userInfoSchema>;

/** Looks up uids by display name. Unknown names are simply absent from `uid_list`. */
export async function nameToUid(
  names: string | string[],
  client: HttpClient = getDefaultClient(),
): Promise<NameToUidResult> {
  const api = client.endpoints.user.info.name_to_uid;
  const params = { names: Array.isArray(names) ? names.join(",") : names };
  return client.request(api, { params }, nameToUidSchema);
}

/** Profile of the account the credential belongs to. */
export async function getSelfInfo(
  credential: Credential,
  client: HttpClient = getDefaultClient(),
): Promise<UserInfo> {
  credential.raiseForNoSessdata();

  const api = client.endpoints.user.info.my_info;
  return client.request(api, { credential }, userInfoSchema);
}

export class User {
  readonly uid: number;
  readonly credential: Credential;
  private readonly client: HttpClient;

  constructor(uid: number, credential?: Credential, client?: HttpClient) {
    this.uid = uid;
    this.credential = credential ?? new Credential();
    this.client = client ?? getDefaultClient();
  }

  async getUserInfo(): Promise<UserInfo> {
    const api = this.client.endpoints.user.info.info;
    return this.client.request(
      api,
      { params: { mid: this.uid }, credential: this.credential },
      userInfoSchema,
    );
  }
}

/** A uid, or a user handle carrying one */
export type UserLike = number | User;

export function toUid(user: UserLike): number {
  return typeof user === "number" ? user : user.uid;
}
