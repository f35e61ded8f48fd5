import { z } from "zod";
import { Credential } from "./lib/credential.js";
import { type HttpClient, getDefaultClient } from "./lib/http.js";

const voteInfoSchema = z
  .object({
    info: z
      .object({
        vote_id: z.number(),
        title: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

export type VoteInfo = z.infer<typeof voteInfoSchema>;

export class Vote {
  readonly voteId: number;
  readonly credential: Credential;
  private readonly client: HttpClient;

  constructor(voteId: number, credential?: Credential, client?: HttpClient) {
    this.voteId = voteId;
    this.credential = credential ?? new Credential();
    this.client = client ?? getDefaultClient();
  }

  async getInfo(): Promise<VoteInfo> {
    const api = this.client.endpoints.vote.info.vote_info;
    return this.client.request(
      api,
      { params: { vote_id: this.voteId }, credential: this.credential },
      voteInfoSchema,
    );
  }

  async getTitle(): Promise<string> {
    const info = await this.getInfo();
    return info.info.title;
  }
}

export type VoteLike = number | Vote;
