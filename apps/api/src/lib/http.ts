import type { MediaKind } from "../store/types.js";

const percent = (c: string) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`;

export function sanitizeFilename(name: string | null | undefined): string {
  const trimmed = (name || "").trim();
  if (!trimmed) return "";
  return trimmed
    .replace(/[\r\n\0]/g, "")
    .replace(/[/\\]/g, "_")
    .replace(/\s+/g, " ")
    .slice(0, 240);
}

/** RFC 6266 header with an ASCII `filename` and the exact name in `filename*`. */
export function formatContentDisposition(filename: string, inline: boolean): string {
  const fallback =
    filename
      .replace(/["\\]/g, "")
      .replace(/[^\x20-\x7e]/g, "_")
      .slice(0, 180) || "file";
  const encoded = encodeURIComponent(filename).replace(/['()*]/g, percent);
  return `${inline ? "inline" : "attachment"}; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

const EXT_BY_MIME: Array<[string, string]> = [
  ["mp4", "mp4"],
  ["webm", "webm"],
  ["matroska", "mkv"],
  ["quicktime", "mov"],
  ["mpeg", "mp3"],
  ["ogg", "ogg"],
  ["wav", "wav"],
  ["flac", "flac"],
  ["jpeg", "jpg"],
  ["png", "png"],
  ["gif", "gif"],
  ["pdf", "pdf"]
];

const EXT_BY_KIND: Record<MediaKind, string> = {
  video: "mp4",
  audio: "mp3",
  voice: "ogg",
  photo: "jpg",
  animation: "mp4",
  document: "bin"
};

/** Name to offer when the origin did not carry one. */
export function defaultFilename(uniqueId: string, mimeType: string | null, kind: MediaKind): string {
  const mime = (mimeType || "").toLowerCase();
  const ext = EXT_BY_MIME.find(([needle]) => mime.includes(needle))?.[1] ?? EXT_BY_KIND[kind];
  return `${uniqueId || "media"}.${ext}`;
}
