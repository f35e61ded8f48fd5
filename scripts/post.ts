import { z } from "zod";
import type {
  AttachCard,
  ContentFragment,
  DynamicBuilder,
  DynamicOptions,
  PicDescriptor,
  TopicRef,
} from "./builder.js";
import { Dynamic } from "./dynamic.js";
import { APP_META, MAX_IMAGES, type SendDynamicType } from "./lib/constants.js";
import type { Credential } from "./lib/credential.js";
import { DynamicExceedImagesException, ResponseException } from "./lib/errors.js";
import { type FilePart, type HttpClient, getDefaultClient } from "./lib/http.js";
import { logger } from "./lib/logger.js";
import type { UploadImageResult } from "./lib/picture.js";

/** JSON body of the publish endpoint */
export interface CreateDynamicRequest {
  dyn_req: {
    content: { contents: ContentFragment[] };
    scene: SendDynamicType;
    meta: { app_meta: { from: string; mobi_app: string } };
    pics?: PicDescriptor[];
    topic?: TopicRef;
    option?: DynamicOptions;
    /** `null` when there is no card; the endpoint expects the key */
    attach_card: { common_card: AttachCard } | null;
  };
}

const sendResultSchema = z
  .object({
    dyn_id: z.number().optional(),
    dyn_id_str: z.string().optional(),
  })
  .passthrough();

const uploadResultSchema = z
  .object({
    image_url: z.string(),
    image_width: z.number(),
    image_height: z.number(),
  })
  .passthrough();

export function buildDynamicRequest(info: DynamicBuilder): CreateDynamicRequest {
  const pics = info.getPics();
  const topic = info.getTopic();
  const options = info.getOptions();
  const attachCard = info.getAttachCard();

  return {
    dyn_req: {
      content: { contents: [...info.getContents()] },
      scene: info.getTransmissionScene(),
      meta: { app_meta: { ...APP_META } },
      ...(pics.length > 0 ? { pics: [...pics] } : {}),
      ...(topic ? { topic } : {}),
      ...(Object.keys(options).length > 0 ? { option: { ...options } } : {}),
      attach_card: attachCard ? { common_card: attachCard } : null,
    },
  };
}

/** Publishes the built dynamic and returns a handle on it. */
export async function sendDynamic(
  info: DynamicBuilder,
  credential: Credential,
  client: HttpClient = getDefaultClient(),
): Promise<Dynamic> {
  credential.raiseForNoSessdata();

  const picCount = info.getPics().length;
  if (picCount > MAX_IMAGES) {
    throw new DynamicExceedImagesException(picCount, MAX_IMAGES);
  }

  const api = client.endpoints.dynamic.send.instant;
  const result = await client.request(
    api,
    {
      params: { csrf: credential.biliJct },
      data: buildDynamicRequest(info),
      jsonBody: true,
      credential,
    },
    sendResultSchema,
  );

  const dynamicId = result.dyn_id_str ?? (result.dyn_id !== undefined ? String(result.dyn_id) : undefined);
  if (!dynamicId) {
    throw new ResponseException("Publish response carries no dyn_id.");
  }

  logger.info("dynamic published", { dynamicId, scene: info.getTransmissionScene() });
  return new Dynamic(dynamicId, credential, client);
}

/** Uploads one image for use with `DynamicBuilder.addImage`. */
export async function uploadImage(
  image: FilePart,
  credential: Credential,
  client: HttpClient = getDefaultClient(),
): Promise<UploadImageResult> {
  credential.raiseForNoSessdata();
  credential.raiseForNoBiliJct();

  const api = client.endpoints.dynamic.send.upload_img;
  return client.request(
    api,
    {
      data: { biz: "new_dyn", category: "daily" },
      files: { file_up: image },
      credential,
    },
    uploadResultSchema,
  );
}
