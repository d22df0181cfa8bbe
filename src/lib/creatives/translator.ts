/** Translates the campaign message for a region's audience */
export interface MessageTranslator {
  translate(message: string, language: string, targetAudience: string): Promise<string>;
}

/** Returns the message unchanged; used when no translation service is wired in */
export const passthroughTranslator: MessageTranslator = {
  async translate(message) {
    return message;
  },
};

const REGION_LANGUAGES: Record<string, string> = {
  quebec: "French",
  france: "French",
  mexico: "Spanish",
  spain: "Spanish",
  india: "Hindi",
  japan: "Japanese",
  china: "Chinese",
  germany: "German",
  brazil: "Portuguese",
};

export function languageForRegion(region: string): string {
  return REGION_LANGUAGES[region.trim().toLowerCase()] ?? "English";
}
