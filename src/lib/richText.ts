/**
 * Rich content helpers: notes keep their plain text in `content` and an HTML
 * rendering of it, UTF-8 encoded, in `richContent`.
 */
import { marked } from "marked";
import type { Note } from "../types/note";

// Configure marked for GFM
marked.setOptions({
  gfm: true,
  breaks: true,
});

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Render markdown to HTML and encode it for storage
 */
export async function renderRichContent(markdown: string): Promise<Uint8Array> {
  const html = await marked.parse(markdown);
  return encoder.encode(html);
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Render untrusted text such as OCR output: HTML in it is escaped and each
 * line break is kept
 */
export async function renderPlainText(text: string): Promise<Uint8Array> {
  return renderRichContent(escapeHtml(text));
}

export function decodeRichContent(richContent: Uint8Array | null): string | null {
  return richContent ? decoder.decode(richContent) : null;
}

/**
 * Text handed to a share sheet / clipboard for a note
 */
export function noteShareText(note: Pick<Note, "title" | "content">): string {
  return `Title: ${note.title}\n\n${note.content ?? ""}`;
}
