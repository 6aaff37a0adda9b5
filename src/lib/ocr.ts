/**
 * Text recognition adapter
 *
 * The recognition engine is pluggable: anything that turns image bytes into
 * candidate strings can be registered with setTextRecognizer().
 */

/** Default recognition languages (BCP-47) */
export const DEFAULT_OCR_LANGUAGES = ["zh-Hans", "zh-Hant", "en-US"];

export interface RecognitionOptions {
  languages: string[];
  /** Prefer accuracy over speed */
  accurate: boolean;
  /** Let the engine apply language-model correction */
  languageCorrection: boolean;
}

/**
 * One region of recognized text; candidates are ordered by confidence,
 * best first
 */
export interface TextObservation {
  candidates: string[];
}

export interface TextRecognizer {
  recognize(image: Uint8Array, options: RecognitionOptions): Promise<TextObservation[]>;
}

export type OcrErrorCode = "NO_RECOGNIZER" | "INVALID_IMAGE" | "RECOGNITION_FAILED" | "NO_TEXT";

export class OcrError extends Error {
  readonly code: OcrErrorCode;

  constructor(code: OcrErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OcrError";
    this.code = code;
  }
}

let recognizer: TextRecognizer | null = null;

export function setTextRecognizer(next: TextRecognizer | null): void {
  recognizer = next;
}

/**
 * Join the best candidate of each observation, one per line
 */
export function joinObservations(observations: TextObservation[]): string {
  return observations
    .map((o) => o.candidates[0])
    .filter((text): text is string => text !== undefined)
    .join("\n");
}

/**
 * Extract plain text from an image
 */
export async function recognizeText(
  image: Uint8Array,
  options: Partial<RecognitionOptions> = {},
): Promise<string> {
  if (!recognizer) {
    throw new OcrError("NO_RECOGNIZER", "No text recognizer configured");
  }
  if (image.byteLength === 0) {
    throw new OcrError("INVALID_IMAGE", "Cannot process an empty image");
  }

  let observations: TextObservation[];
  try {
    observations = await recognizer.recognize(image, {
      languages: options.languages ?? DEFAULT_OCR_LANGUAGES,
      accurate: options.accurate ?? true,
      languageCorrection: options.languageCorrection ?? true,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new OcrError("RECOGNITION_FAILED", `Text recognition failed: ${message}`, {
      cause: error,
    });
  }

  const text = joinObservations(observations);
  if (!text) {
    throw new OcrError("NO_TEXT", "No text recognized");
  }
  return text;
}
