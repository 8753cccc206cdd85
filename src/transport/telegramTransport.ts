import path from "node:path";
import { Input, type Telegram } from "telegraf";
import { logger } from "../logger";
import { classifyTransportError } from "./classify";
import type { MessageTransport } from "./types";

// Bot API caption cap; longer texts go out as a separate message.
export const CAPTION_LIMIT = 1024;

export type MediaKind = "photo" | "video" | "document";

type MediaSource = ReturnType<typeof Input.fromLocalFile> | string;

export type TelegramSender = Pick<Telegram, "sendMessage" | "sendPhoto" | "sendVideo" | "sendDocument" | "sendMediaGroup">;

const PHOTO_EXTENSIONS = new Set([".jpg", ".jpeg", ".png"]);
const VIDEO_EXTENSIONS = new Set([".mp4", ".avi", ".mov"]);

export function mediaKindOf(ref: string): MediaKind {
  const withoutQuery = ref.split(/[?#]/)[0] ?? ref;
  const ext = path.extname(withoutQuery).toLowerCase();
  if (PHOTO_EXTENSIONS.has(ext)) return "photo";
  if (VIDEO_EXTENSIONS.has(ext)) return "video";
  return "document";
}

function isUrlMediaRef(ref: string): boolean {
  return /^https?:\/\//i.test(ref);
}

/** A media ref that names a file on this machine rather than a URL or a Telegram file_id. */
export function isLocalMediaRef(ref: string): boolean {
  return !isUrlMediaRef(ref) && (ref.includes("/") || ref.includes("\\"));
}

/** URL refs are fetched by Telegram, path-like refs are uploaded from disk, anything else is a Telegram file_id. */
export function toMediaSource(ref: string): MediaSource {
  if (isUrlMediaRef(ref)) return Input.fromURL(ref);
  if (isLocalMediaRef(ref)) return Input.fromLocalFile(ref);
  return ref;
}

async function sendSingleMedia(
  telegram: TelegramSender,
  chatId: string,
  ref: string,
  caption: string | undefined
): Promise<void> {
  const source = toMediaSource(ref);
  const extra = caption ? { caption } : {};
  const kind = mediaKindOf(ref);
  if (kind === "photo") {
    await telegram.sendPhoto(chatId, source, extra);
  } else if (kind === "video") {
    await telegram.sendVideo(chatId, source, extra);
  } else {
    await telegram.sendDocument(chatId, source, extra);
  }
}

async function sendAlbum(telegram: TelegramSender, chatId: string, refs: readonly string[], caption: string | undefined) {
  const media = refs.map((ref, index) => {
    const itemCaption = index === 0 ? caption : undefined;
    const source = toMediaSource(ref);
    return mediaKindOf(ref) === "photo"
      ? { type: "photo" as const, media: source, caption: itemCaption }
      : { type: "video" as const, media: source, caption: itemCaption };
  });
  await telegram.sendMediaGroup(chatId, media);
}

export function createTelegramTransport(telegram: TelegramSender): MessageTransport {
  return {
    async send(address, text, mediaRefs) {
      try {
        if (mediaRefs.length === 0) {
          await telegram.sendMessage(address, text);
          return;
        }

        const captionFits = text.length > 0 && text.length <= CAPTION_LIMIT;
        const caption = captionFits ? text : undefined;
        if (!captionFits && text.length > 0) {
          await telegram.sendMessage(address, text);
        }

        // Albums accept photos and videos only (2-10 items); anything else goes one by one.
        const albumable =
          mediaRefs.length >= 2 && mediaRefs.length <= 10 && mediaRefs.every((ref) => mediaKindOf(ref) !== "document");

        if (albumable) {
          await sendAlbum(telegram, address, mediaRefs, caption);
          return;
        }

        for (const [index, ref] of mediaRefs.entries()) {
          await sendSingleMedia(telegram, address, ref, index === 0 ? caption : undefined);
        }
      } catch (err) {
        const classified = classifyTransportError(err);
        logger.debug({ address, kind: classified.kind, reason: classified.reason }, "Telegram send failed");
        throw classified;
      }
    }
  };
}
