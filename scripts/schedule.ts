import type { Credential } from "./lib/credential.js";
import { type HttpClient, type RawData, getDefaultClient, rawData } from "./lib/http.js";

/** Scheduled dynamics still waiting to go out */
export async function getSchedulesList(
  credential: Credential,
  client: HttpClient = getDefaultClient(),
): Promise<RawData> {
  credential.raiseForNoSessdata();

  const api = client.endpoints.dynamic.schedule.list;
  return client.request(api, { credential }, rawData);
}

export async function sendScheduleNow(
  draftId: number,
  credential: Credential,
  client: HttpClient = getDefaultClient(),
): Promise<RawData> {
  credential.raiseForNoSessdata();

  const api = client.endpoints.dynamic.schedule.publish_now;
  return client.request(api, { data: { draft_id: draftId }, credential }, rawData);
}

export async function deleteSchedule(
  draftId: number,
  credential: Credential,
  client: HttpClient = getDefaultClient(),
): Promise<RawData> {
  credential.raiseForNoSessdata();

  const api = client.endpoints.dynamic.schedule.delete;
  return client.request(api, { data: { draft_id: draftId }, credential }, rawData);
}
