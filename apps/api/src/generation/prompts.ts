import type { PostTone } from "@postroom/shared";

export interface PostPromptInput {
  subject: string;
  tone: PostTone;
  maxLength: number;
  includeEmoji: boolean;
}

export function buildPostPrompt(input: PostPromptInput): string {
  return [
    `Write an engaging social media post about our organic ${input.subject}.`,
    "",
    "Requirements:",
    `- Tone: ${input.tone}`,
    `- Length: at most ${input.maxLength} characters`,
    "- Cover its health benefits, its natural origin, what makes it special, and end with a call to action",
    input.includeEmoji ? "- Use fitting emoji" : "- Do not use emoji",
    "",
    'No hashtags. Do not start with "Title:" or "Post:"; begin directly with the post text.',
  ].join("\n");
}

export function buildRevisionPrompt(
  input: PostPromptInput & { previousText: string; instruction?: string },
): string {
  const request = input.instruction?.trim() || "Write a fresh variation with the same key message.";
  return [
    `Revise the following post about ${input.subject} according to this instruction: "${request}"`,
    "",
    "Original post:",
    input.previousText,
    "",
    `Keep the ${input.tone} tone, the core message, and stay under ${input.maxLength} characters.`,
    "Return only the revised post text.",
  ].join("\n");
}

export const IMAGE_NEGATIVE_PROMPT =
  "low quality, blurry, distorted, text overlay, watermark, logo, brand name, cartoon, illustration";

export function buildImagePrompt(subject: string): string {
  return [
    `Professional product photography of organic ${subject} in a glass jar on a rustic wooden table,`,
    "natural sunlight through a window, warm tones, soft-focus wildflowers in the background,",
    "high resolution, commercial quality, clean aesthetic, no text, no labels",
  ].join(" ");
}
