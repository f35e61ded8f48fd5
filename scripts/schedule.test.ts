import { describe, expect, it } from "vitest";
import { Credential } from "./lib/credential.js";
import { CredentialNoSessdataException } from "./lib/errors.js";
import { deleteSchedule, getSchedulesList, sendScheduleNow } from "./schedule.js";
import { createTestClient, formOf, ok } from "./testing/fake-fetch.js";

const PATHS = {
  list: "/dynamic_draft/v1/dynamic_draft/get_drafts",
  publish: "/dynamic_draft/v1/dynamic_draft/publish_now",
  remove: "/dynamic_draft/v1/dynamic_draft/rm_draft",
};

const credential = new Credential({ sessdata: "test-sessdata", biliJct: "test-jct" });

describe("scheduled dynamics", () => {
  it("lists pending drafts", async () => {
    const { client, calls } = createTestClient({
      [PATHS.list]: () => ok({ drafts: [{ draft_id: 5 }] }),
    });

    const result = await getSchedulesList(credential, client);

    expect(result).toEqual({ drafts: [{ draft_id: 5 }] });
    expect(calls[0].method).toBe("GET");
  });

  it("publishes a draft now", async () => {
    const { client, calls } = createTestClient({ [PATHS.publish]: () => ok({}) });

    await sendScheduleNow(5, credential, client);

    const form = formOf(calls[0]);
    expect(form.get("draft_id")).toBe("5");
    expect(form.get("csrf_token")).toBe("test-jct");
  });

  it("deletes a draft", async () => {
    const { client, calls } = createTestClient({ [PATHS.remove]: () => ok(null) });

    const result = await deleteSchedule(6, credential, client);

    expect(result).toEqual({});
    expect(formOf(calls[0]).get("draft_id")).toBe("6");
  });

  it("requires SESSDATA", async () => {
    const { client, calls } = createTestClient({});
    const anonymous = new Credential();

    await expect(getSchedulesList(anonymous, client)).rejects.toBeInstanceOf(CredentialNoSessdataException);
    await expect(sendScheduleNow(1, anonymous, client)).rejects.toBeInstanceOf(CredentialNoSessdataException);
    await expect(deleteSchedule(1, anonymous, client)).rejects.toBeInstanceOf(CredentialNoSessdataException);
    expect(calls).toHaveLength(0);
  });
});
