import fs from "fs";
import path from "path";
import type { ModelImage, TextModel } from "@/types";
import { PAGE_TRANSCRIPTION_PROMPT } from "@/lib/analysisPrompts";
import { prepareImage } from "@/lib/analyzeImages";
import { errorMessage } from "@/lib/errors";
import { PAGE_SUFFIXES } from "@/lib/pages";

// ── Page transcription ──────────────────────────────────────────────────────
// Fills in page text the letters stage would otherwise lack: every scan in the
// images directory without a "<key>_german.txt" gets one transcribed by the model.

export const OCR_IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png"] as const;

export interface TranscribeOptions {
  model: TextModel;
  /** Image loader; defaults to prepareImage(). */
  loadImage?: (imagePath: string) => Promise<ModelImage>;
}

export interface TranscribeSummary {
  transcribed: number;
  skipped: number;
  failed: number;
}

function isScan(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return OCR_IMAGE_EXTENSIONS.some((e) => e === ext);
}

export function transcriptPathFor(imagePath: string, pagesDir: string): string {
  const key = path.basename(imagePath, path.extname(imagePath));
  return path.join(pagesDir, `${key}${PAGE_SUFFIXES[0]}`);
}

/**
 * Transcribe the scans directly inside imagesDir that have no page text yet.
 * A failed transcription still writes an empty page file, so the page is
 * not retried on the next run and shows up in grouping as blank.
 */
export async function transcribeMissingPages(
  imagesDir: string,
  pagesDir: string,
  options: TranscribeOptions,
): Promise<TranscribeSummary> {
  const loadImage = options.loadImage ?? prepareImage;
  const images = fs
    .readdirSync(imagesDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isScan(entry.name))
    .map((entry) => path.join(imagesDir, entry.name))
    .sort();
  const summary: TranscribeSummary = { transcribed: 0, skipped: 0, failed: 0 };

  fs.mkdirSync(pagesDir, { recursive: true });
  for (let i = 0; i < images.length; i++) {
    const image = images[i];
    const outPath = transcriptPathFor(image, pagesDir);
    if (fs.existsSync(outPath)) {
      summary.skipped++;
      continue;
    }
    console.log(`  [${i + 1}/${images.length}] OCR: ${path.basename(image)}`);

    let text = "";
    try {
      const response = await options.model({
        prompt: PAGE_TRANSCRIPTION_PROMPT,
        images: [await loadImage(image)],
        maxTokens: 4096,
        temperature: 0.3,
      });
      text = response.text;
      summary.transcribed++;
    } catch (err) {
      console.error(`  OCR error for ${path.basename(image)}: ${errorMessage(err)}`);
      summary.failed++;
    }
    fs.writeFileSync(outPath, text, "utf-8");
  }

  return summary;
}
