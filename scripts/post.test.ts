import { describe, expect, it } from "vitest";
import { DynamicBuilder } from "./builder.js";
import { Credential } from "./lib/credential.js";
import {
  CredentialNoBiliJctException,
  CredentialNoSessdataException,
  DynamicExceedImagesException,
  ResponseException,
} from "./lib/errors.js";
import { pictureFromUpload } from "./lib/picture.js";
import { buildDynamicRequest, sendDynamic, uploadImage } from "./post.js";
import { createTestClient, jsonOf, multipartOf, ok } from "./testing/fake-fetch.js";

const SEND_PATH = "/x/dynamic/feed/create/dyn";
const UPLOAD_PATH = "/x/dynamic/feed/draw/upload_bfs";

const credential = new Credential({ sessdata: "test-sessdata", biliJct: "test-jct" });

describe("buildDynamicRequest", () => {
  it("omits optional keys but always sends attach_card", () => {
    const request = buildDynamicRequest(new DynamicBuilder().addText("hello"));

    expect(Object.keys(request.dyn_req)).toEqual(["content", "scene", "meta", "attach_card"]);
    expect(request).toEqual({
      dyn_req: {
        content: { contents: [{ biz_id: "", type: 1, raw_text: "hello" }] },
        scene: 1,
        meta: { app_meta: { from: "create.dynamic.web", mobi_app: "web" } },
        attach_card: null,
      },
    });
  });

  it("includes every optional part that was set", () => {
    const builder = new DynamicBuilder()
      .addText("live soon")
      .addImage({ url: "u", width: 10, height: 20 })
      .setTopic(3)
      .setOptions(false, true)
      .setAttachCard(555);

    const request = buildDynamicRequest(builder);

    expect(Object.keys(request.dyn_req)).toEqual([
      "content",
      "scene",
      "meta",
      "pics",
      "topic",
      "option",
      "attach_card",
    ]);
    expect(request.dyn_req.scene).toBe(2);
    expect(request.dyn_req.topic).toEqual({ id: 3 });
    expect(request.dyn_req.option).toEqual({ close_comment: 1 });
    expect(request.dyn_req.attach_card).toEqual({
      common_card: { type: 14, biz_id: 555, reserve_source: 1, reserve_lottery: 0 },
    });
  });
});

describe("sendDynamic", () => {
  it("posts the built body as JSON and returns a handle", async () => {
    const { client, calls } = createTestClient({
      [SEND_PATH]: () => ok({ dyn_id: 1, dyn_id_str: "900000000000000001" }),
    });
    const builder = new DynamicBuilder()
      .addText("hello")
      .addImage({ url: "u", width: 10, height: 20 });

    const dynamic = await sendDynamic(builder, credential, client);

    expect(dynamic.getDynamicId()).toBe("900000000000000001");
    expect(calls).toHaveLength(1);
    const [call] = calls;
    expect(call.method).toBe("POST");
    expect(call.url.searchParams.get("csrf")).toBe("test-jct");
    expect(call.headers.get("Content-Type")).toBe("application/json");
    expect(call.headers.get("Cookie")).toBe("SESSDATA=test-sessdata; bili_jct=test-jct");
    expect(jsonOf(call)).toEqual({
      dyn_req: {
        content: { contents: [{ biz_id: "", type: 1, raw_text: "hello" }] },
        scene: 2,
        meta: { app_meta: { from: "create.dynamic.web", mobi_app: "web" } },
        pics: [{ img_src: "u", img_width: 10, img_height: 20 }],
        attach_card: null,
      },
    });
  });

  it("falls back to the numeric dyn_id", async () => {
    const { client } = createTestClient({ [SEND_PATH]: () => ok({ dyn_id: 12345 }) });

    const dynamic = await sendDynamic(new DynamicBuilder().addText("x"), credential, client);

    expect(dynamic.getDynamicId()).toBe("12345");
  });

  it("rejects a response without an id", async () => {
    const { client } = createTestClient({ [SEND_PATH]: () => ok({}) });

    await expect(
      sendDynamic(new DynamicBuilder().addText("x"), credential, client),
    ).rejects.toBeInstanceOf(ResponseException);
  });

  it("requires SESSDATA before any request", async () => {
    const { client, calls } = createTestClient({});

    await expect(
      sendDynamic(new DynamicBuilder().addText("x"), new Credential(), client),
    ).rejects.toBeInstanceOf(CredentialNoSessdataException);
    expect(calls).toHaveLength(0);
  });

  it("refuses more than nine images", async () => {
    const { client, calls } = createTestClient({});
    const builder = new DynamicBuilder();
    for (let i = 0; i < 10; i++) builder.addImage({ url: `u${i}`, width: 1, height: 1 });

    await expect(sendDynamic(builder, credential, client)).rejects.toBeInstanceOf(
      DynamicExceedImagesException,
    );
    expect(calls).toHaveLength(0);
  });
});

describe("uploadImage", () => {
  it("sends the file as multipart with csrf fields", async () => {
    const { client, calls } = createTestClient({
      [UPLOAD_PATH]: () =>
        ok({ image_url: "https://i0.hdslb.com/bfs/new_dyn/a.png", image_width: 640, image_height: 480 }),
    });

    const result = await uploadImage(
      { content: new Uint8Array([1, 2, 3]), filename: "a.png" },
      credential,
      client,
    );

    expect(result).toEqual({
      image_url: "https://i0.hdslb.com/bfs/new_dyn/a.png",
      image_width: 640,
      image_height: 480,
    });
    const form = multipartOf(calls[0]);
    expect(form.get("biz")).toBe("new_dyn");
    expect(form.get("category")).toBe("daily");
    expect(form.get("csrf")).toBe("test-jct");
    expect(form.has("file_up")).toBe(true);

    const builder = new DynamicBuilder().addImage(pictureFromUpload(result));
    expect(builder.getPics()).toEqual([
      { img_src: "https://i0.hdslb.com/bfs/new_dyn/a.png", img_width: 640, img_height: 480 },
    ]);
  });

  it("requires bili_jct", async () => {
    const { client, calls } = createTestClient({});

    await expect(
      uploadImage({ content: new Uint8Array([1]) }, new Credential({ sessdata: "test-sessdata" }), client),
    ).rejects.toBeInstanceOf(CredentialNoBiliJctException);
    expect(calls).toHaveLength(0);
  });
});
