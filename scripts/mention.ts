import { Credential } from "./lib/credential.js";
import { type HttpClient, getDefaultClient } from "./lib/http.js";
import { User, nameToUid } from "./user.js";

/** Rich-text control record for one mention */
export interface AtControl {
  location: number;
  type: 1;
  length: number;
  data: number;
}

export interface AtParseResult {
  text: string;
  /** Comma-joined uids, in the order the mentions appear */
  atUids: string;
  /** JSON-encoded `AtControl[]` */
  ctrl: string;
}

/** Payload for endpoints that take plain text with mentions (repost). */
export interface TextData {
  dynamic_id: string | number;
  type: 4;
  rid: 0;
  content: string;
  extension: string;
  at_uids: string;
  ctrl: string;
}

export interface MentionOptions {
  credential?: Credential;
  client?: HttpClient;
}

interface ResolvedMention {
  token: string;
  uid: number;
  name: string;
}

interface MentionMatch {
  token: string;
  /** UTF-16 offset of the "@" in the source text */
  index: number;
}

const MENTION_RE = /@(\S*)/g;

/** Offsets sent to the platform count code points, not UTF-16 units. */
function codePointLength(text: string): number {
  return [...text].length;
}

/** Every "@token" run, ended by whitespace or the end of the text. */
function findMentions(text: string): MentionMatch[] {
  const re = new RegExp(MENTION_RE);
  const found: MentionMatch[] = [];
  for (let m = re.exec(text); m !== null; m = re.exec(text)) {
    found.push({ token: m[1], index: m.index });
  }
  return found;
}

async function resolveMention(
  token: string,
  credential: Credential,
  client: HttpClient,
): Promise<ResolvedMention | null> {
  if (!token) return null;

  const lookup = await nameToUid(token, client);
  const hit = lookup.uid_list?.[0];
  // Unknown name: leave the text as typed
  if (!hit) return null;

  const uid = Number(hit.uid);
  const info = await new User(uid, credential, client).getUserInfo();
  return { token, uid, name: info.name };
}

/**
 * Resolves every "@name" in `text` to a user. Each name is replaced by the
 * user's current display name and reported in `atUids` and `ctrl`.
 */
export async function parseAt(text: string, options: MentionOptions = {}): Promise<AtParseResult> {
  const credential = options.credential ?? new Credential();
  const client = options.client ?? getDefaultClient();

  const matches = findMentions(text);
  const resolved = await Promise.all(
    matches.map(({ token }) => resolveMention(token, credential, client)),
  );

  // Rebuilt by match position, so the whitespace after each mention is kept
  let rewritten = "";
  let cursor = 0;
  const mentions: Array<ResolvedMention & { offset: number }> = [];
  matches.forEach(({ token, index }, i) => {
    const mention = resolved[i];
    if (!mention) return;
    rewritten += text.slice(cursor, index);
    mentions.push({ ...mention, offset: rewritten.length });
    rewritten += `@${mention.name}`;
    cursor = index + 1 + token.length;
  });
  rewritten += text.slice(cursor);

  const ctrl: AtControl[] = mentions.map(({ uid, name, offset }) => {
    // First occurrence of the name, which is at or before its own slot
    const first = rewritten.indexOf(`@${name}`);
    const index = first === -1 ? offset : first;
    return {
      location: codePointLength(rewritten.slice(0, index)),
      type: 1,
      length: 2 + codePointLength(name),
      data: uid,
    };
  });

  return {
    text: rewritten,
    atUids: mentions.map((m) => String(m.uid)).join(","),
    ctrl: JSON.stringify(ctrl),
  };
}

export async function getTextData(text: string, options: MentionOptions = {}): Promise<TextData> {
  const { text: content, atUids, ctrl } = await parseAt(text, options);
  return {
    dynamic_id: 0,
    type: 4,
    rid: 0,
    content,
    extension: '{"emoji_type":1}',
    at_uids: atUids,
    ctrl,
  };
}
