import type { LanguageT } from "../schemas/document.js";

/** Spoken while a tool call is in flight */
export const FILLER_SENTENCES: Readonly<Record<LanguageT, readonly string[]>> = {
  "en-US": [
    "One moment please.",
    "Let me check that for you.",
    "Just a second.",
    "I'm looking into it now.",
    "Thanks for your patience.",
  ],
  "he-IL": [
    "רגע אחד בבקשה.",
    "אני בודק את זה עבורך.",
    "שנייה אחת.",
    "אני מטפל בזה עכשיו.",
    "תודה על הסבלנות.",
  ],
};

/** Pronunciation hints for Hebrew speech synthesis */
export const NIKUD_REPLACEMENTS: ReadonlyArray<{ original: string; replacement: string }> = [
  { original: "שלום", replacement: "שָׁלוֹם" },
  { original: "תודה", replacement: "תּוֹדָה" },
  { original: "בבקשה", replacement: "בְּבַקָּשָׁה" },
  { original: "הזמנה", replacement: "הַזְמָנָה" },
  { original: "מספר", replacement: "מִסְפָּר" },
  { original: "נציג", replacement: "נְצִיג" },
];

export function initialMessage(agentName: string, language: LanguageT): string {
  return language === "he-IL"
    ? `שלום, הגעתם ל${agentName}. איך אפשר לעזור?`
    : `Welcome to ${agentName}. How can I assist you today?`;
}

export function closingMessage(language: LanguageT): string {
  return language === "he-IL" ? "תודה שפניתם אלינו. להתראות!" : "Thank you for contacting us. Goodbye!";
}

export function collectPrompt(variableName: string, language: LanguageT = "en-US"): string {
  const label = variableName.replace(/_/g, " ");
  return language === "he-IL" ? `אנא מסרו את ${label}` : `Please provide your ${label}`;
}
