#!/usr/bin/env npx tsx
/**
 * Dynamic CLI. Prints one JSON object per run on stdout.
 *
 * Credential cookies come from BILI_COOKIE, or BILI_SESSDATA / BILI_JCT /
 * BILI_BUVID3 / BILI_DEDEUSERID, or --cookie "SESSDATA=...; bili_jct=...".
 *
 * Usage:
 *   npx tsx scripts/cli.ts info     --id <dynamic id>
 *   npx tsx scripts/cli.ts reposts  --id <id> [--offset 0]
 *   npx tsx scripts/cli.ts likes    --id <id> [--pn 1] [--ps 30]
 *   npx tsx scripts/cli.ts like     --id <id> [--status true|false]
 *   npx tsx scripts/cli.ts delete   --id <id>
 *   npx tsx scripts/cli.ts repost   --id <id> [--text "..."]
 *   npx tsx scripts/cli.ts post     --text "..." [--images '[{"url":"...","width":1,"height":1}]'] [--topic <id>] [--attach-card <oid>] [--up-choose-comment] [--close-comment]
 *   npx tsx scripts/cli.ts upload-image --file <path>
 *   npx tsx scripts/cli.ts feed     [--type all|pgc|article|video] [--host-mid <uid>] [--page 1] [--offset <offset>]
 *   npx tsx scripts/cli.ts schedules
 *   npx tsx scripts/cli.ts schedule-send   --draft-id <id>
 *   npx tsx scripts/cli.ts schedule-delete --draft-id <id>
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { z } from "zod";
import { DynamicBuilder } from "./builder.js";
import { Dynamic } from "./dynamic.js";
import { getDynamicPageInfo } from "./feed.js";
import { type CliFlags, parseFlags } from "./lib/args.js";
import { DynamicType } from "./lib/constants.js";
import { Credential } from "./lib/credential.js";
import { getClientConfig } from "./lib/env.js";
import { ArgsException } from "./lib/errors.js";
import { HttpClient } from "./lib/http.js";
import { logger } from "./lib/logger.js";
import { sendDynamic, uploadImage } from "./post.js";
import { deleteSchedule, getSchedulesList, sendScheduleNow } from "./schedule.js";

const imagesSchema = z.array(
  z.object({ url: z.string(), width: z.number(), height: z.number() }),
);

const feedTypeSchema = z.enum([
  DynamicType.ALL,
  DynamicType.ANIME,
  DynamicType.ARTICLE,
  DynamicType.VIDEO,
]);

function loadCredential(flags: CliFlags): Credential {
  const cookie = flags.string("cookie") || process.env.BILI_COOKIE;
  if (cookie) return Credential.fromCookieString(cookie);
  return new Credential({
    sessdata: process.env.BILI_SESSDATA,
    biliJct: process.env.BILI_JCT,
    buvid3: process.env.BILI_BUVID3,
    dedeuserid: process.env.BILI_DEDEUSERID,
  });
}

async function run(
  command: string,
  flags: CliFlags,
  credential: Credential,
  client: HttpClient,
): Promise<unknown> {
  const dynamic = () => new Dynamic(flags.require("id"), credential, client);

  switch (command) {
    case "info":
      return dynamic().getInfo();

    case "reposts":
      return dynamic().getReposts(flags.string("offset"));

    case "likes":
      return dynamic().getLikes(flags.int("pn"), flags.int("ps"));

    case "like":
      return dynamic().setLike(flags.bool("status", true));

    case "delete":
      return dynamic().delete();

    case "repost":
      return dynamic().repost(flags.string("text"));

    case "post": {
      const builder = new DynamicBuilder(client).addText(flags.require("text"));

      if (flags.string("images")) {
        const images = imagesSchema.safeParse(flags.json("images"));
        if (!images.success) {
          throw new ArgsException("--images must be an array of {url, width, height}.");
        }
        for (const image of images.data) builder.addImage(image);
      }
      const topic = flags.int("topic");
      if (topic !== undefined) builder.setTopic(topic);
      const attachCard = flags.int("attach-card");
      if (attachCard !== undefined) builder.setAttachCard(attachCard);
      builder.setOptions(flags.bool("up-choose-comment", false), flags.bool("close-comment", false));

      const sent = await sendDynamic(builder, credential, client);
      return { dynamicId: sent.getDynamicId() };
    }

    case "upload-image": {
      const path = flags.require("file");
      const content = await readFile(path);
      return uploadImage({ content, filename: basename(path) }, credential, client);
    }

    case "feed": {
      const rawType = flags.string("type");
      const type = rawType === undefined ? undefined : feedTypeSchema.safeParse(rawType);
      if (type && !type.success) {
        throw new ArgsException(`Unknown --type: ${rawType}`);
      }
      const dynamics = await getDynamicPageInfo({
        credential,
        client,
        type: type?.data,
        hostMid: flags.int("host-mid"),
        page: flags.int("page"),
        offset: flags.string("offset"),
      });
      return { dynamicIds: dynamics.map((d) => d.getDynamicId()) };
    }

    case "schedules":
      return getSchedulesList(credential, client);

    case "schedule-send":
      return sendScheduleNow(flags.requireInt("draft-id"), credential, client);

    case "schedule-delete":
      return deleteSchedule(flags.requireInt("draft-id"), credential, client);

    default:
      throw new ArgsException(`Unknown command: ${command}`);
  }
}

async function main(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2);

  if (!command) {
    console.log(JSON.stringify({
      success: false,
      message: "Usage: npx tsx scripts/cli.ts <info|reposts|likes|like|delete|repost|post|upload-image|feed|schedules|schedule-send|schedule-delete> [options]",
    }));
    process.exit(1);
  }

  try {
    const flags = parseFlags(rest);
    const client = new HttpClient({ config: getClientConfig() });
    const data = await run(command, flags, loadCredential(flags), client);

    console.log(JSON.stringify({ success: true, data }, null, 2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("command failed", { command }, error instanceof Error ? error : undefined);
    console.log(JSON.stringify({ success: false, message }));
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
