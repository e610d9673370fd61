/**
 * Metadata Extractor
 *
 * Agent name, description, language, channel and phase.
 *
 * @module parser/metadata-extractor
 */

import type { ChannelT, DocumentMetadataT, LanguageT } from "../schemas/document.js";
import { cleanText, findSection, firstParagraph, splitLines } from "./text-sections.js";

const HEBREW_CHAR = /[\u0590-\u05FF]/;

const TITLE_SUFFIX = /\s*[-–:]?\s*\b(PRD|Document|Specification|Spec|Requirements?)\s*$/i;

const NAME_FIELDS = [
  /^\s*(?:Agent|Bot)\s*Name\s*:\s*(.+)$/im,
  /^\s*Project\s*(?:Name|Title)\s*:\s*(.+)$/im,
];

const BOTH_INDICATORS = [
  /channel\s*:\s*(?:both|dual|all|voice\s*(?:\+|and|&)\s*text|text\s*(?:\+|and|&)\s*voice)/,
  /text\s*\+\s*audio/,
  /audio\s*\+\s*text/,
];

const VOICE_INDICATORS = [
  /channel\s*:\s*(?:voice|audio|phone|call)/,
  /voice\s*(?:bot|agent|channel|assistant)/,
  /flow\s*\(audio\)/,
  /(?:voice|audio|call) flow/,
  /phone call/,
];

const TEXT_INDICATORS = [
  /channel\s*:\s*(?:text|chat|whatsapp|sms)/,
  /(?:text|chat|whatsapp|sms)\s*(?:bot|agent|channel)/,
  /flow\s*\(text\)/,
  /(?:text|chat|whatsapp) flow/,
  /\bwhatsapp\b/,
];

export function extractName(content: string): string | null {
  const title = /^#\s+(.+?)\s*#*\s*$/m.exec(content);
  if (title) {
    const name = cleanText(title[1]).replace(TITLE_SUFFIX, "").trim();
    if (name && name.length < 100) return name;
  }

  for (const pattern of NAME_FIELDS) {
    const match = pattern.exec(content);
    if (match) {
      const name = cleanText(match[1]);
      if (name && name.length < 100) return name;
    }
  }
  return null;
}

export function extractDescription(content: string): string {
  const section = findSection(content, ["Overview", "Description", "Summary", "Introduction", "About"], {
    maxLevel: 2,
  });
  if (section) {
    const paragraph = firstParagraph(section);
    if (paragraph) return paragraph;
  }

  const field = /^\s*Description\s*:\s*(.+)$/im.exec(content);
  return field ? cleanText(field[1]).slice(0, 500) : "";
}

/**
 * Any character of the Hebrew block marks a Hebrew agent; an explicit
 * language field is consulted only for documents written without one.
 */
export function detectLanguage(content: string): LanguageT {
  if (HEBREW_CHAR.test(content)) return "he-IL";
  if (/language\s*:\s*(?:hebrew|he-il|he)\b/i.test(content)) return "he-IL";
  return "en-US";
}

export function detectChannel(content: string, fallback: ChannelT = "both"): ChannelT {
  const lower = content.toLowerCase();
  if (BOTH_INDICATORS.some((pattern) => pattern.test(lower))) return "both";

  const voice = VOICE_INDICATORS.some((pattern) => pattern.test(lower));
  const text = TEXT_INDICATORS.some((pattern) => pattern.test(lower));
  if (voice && text) return "both";
  if (voice) return "voice";
  if (text) return "text";
  return fallback;
}

export function extractPhase(content: string): number {
  const match = /\bphase\s*:?\s*(\d+)/i.exec(content);
  if (!match) return 1;
  const phase = Number.parseInt(match[1], 10);
  return phase > 0 ? phase : 1;
}

export function extractMetadata(content: string, defaultChannel: ChannelT = "both"): DocumentMetadataT {
  return {
    name: extractName(content) ?? "Unnamed Agent",
    description: extractDescription(content),
    language: detectLanguage(content),
    channel: detectChannel(content, defaultChannel),
    phase: extractPhase(splitLines(content).slice(0, 40).join("\n")),
  };
}
