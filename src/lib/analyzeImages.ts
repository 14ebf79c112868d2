import fs from "fs";
import path from "path";
import sharp from "sharp";
import type { ImageMediaType, ModelImage, TextModel } from "@/types";
import { IMAGE_ANALYSIS_PROMPT } from "@/lib/analysisPrompts";
import { extractAnalysisId, processingMetadata } from "@/lib/analysis";
import { extractJson, isRecord } from "@/lib/claude";
import { MalformedResponseError, errorMessage, responseExcerpt } from "@/lib/errors";
import { listFilesRecursive, writeJson } from "@/lib/utils";

export const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".webp", ".tif", ".tiff"] as const;
export const MAX_IMAGE_BYTES = 5 * 1024 * 1024; // 5 MB

const DIRECT_MEDIA_TYPES: Record<string, ImageMediaType> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

export function isImageFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return IMAGE_EXTENSIONS.some((e) => e === ext);
}

export function analysisPathFor(imagePath: string): string {
  const stem = path.basename(imagePath, path.extname(imagePath));
  return path.join(path.dirname(imagePath), `${stem}.json`);
}

// ── Image size limiting ─────────────────────────────────────────────────────

async function ensureUnderSizeLimit(buf: Buffer): Promise<Buffer> {
  if (buf.length <= MAX_IMAGE_BYTES) return buf;

  // Quality reduction first (faster than resize)
  for (const quality of [85, 75, 60, 45]) {
    const result = await sharp(buf).jpeg({ quality }).toBuffer();
    if (result.length <= MAX_IMAGE_BYTES) return result;
  }

  // Scale down by 70% repeatedly until under limit
  const meta = await sharp(buf).metadata();
  const width = meta.width || 2000;
  const height = meta.height || 3000;
  let scale = 0.7;
  let result = buf;
  for (let attempt = 0; attempt < 5 && result.length > MAX_IMAGE_BYTES; attempt++) {
    result = await sharp(buf)
      .resize({ width: Math.floor(width * scale), height: Math.floor(height * scale) })
      .jpeg({ quality: 70 })
      .toBuffer();
    scale *= 0.7;
  }
  return result;
}

/**
 * Load an image in a form the model accepts: TIFF scans become JPEG, and
 * anything over MAX_IMAGE_BYTES is re-encoded smaller.
 */
export async function prepareImage(imagePath: string): Promise<ModelImage> {
  const ext = path.extname(imagePath).toLowerCase();
  const direct = DIRECT_MEDIA_TYPES[ext];

  let buf: Buffer = direct ? fs.readFileSync(imagePath) : await sharp(imagePath).jpeg({ quality: 90 }).toBuffer();
  let mediaType: ImageMediaType = direct ?? "image/jpeg";

  if (buf.length > MAX_IMAGE_BYTES) {
    buf = await ensureUnderSizeLimit(buf);
    mediaType = "image/jpeg";
  }

  return { base64: buf.toString("base64"), mediaType };
}

// ── Image analysis stage ────────────────────────────────────────────────────

export interface AnalyzeImagesOptions {
  model: TextModel;
  modelName: string;
  skipExisting?: boolean;
  limit?: number;
  /** Image loader; defaults to prepareImage(). */
  loadImage?: (imagePath: string) => Promise<ModelImage>;
}

export interface AnalyzeImagesSummary {
  processed: number;
  skipped: number;
  failed: number;
}

/** Analyze one image. Failures come back as a record with "error" set. */
export async function analyzeImage(
  imagePath: string,
  options: AnalyzeImagesOptions,
): Promise<Record<string, unknown>> {
  const fileName = path.basename(imagePath);
  const loadImage = options.loadImage ?? prepareImage;

  let image: ModelImage;
  try {
    image = await loadImage(imagePath);
  } catch (err) {
    return { file_name: fileName, error: `Failed to load image: ${errorMessage(err)}` };
  }

  let result: Record<string, unknown>;
  try {
    const response = await options.model({
      prompt: IMAGE_ANALYSIS_PROMPT,
      images: [image],
      maxTokens: 16384,
      temperature: 0.3,
    });
    const parsed = extractJson(response.text);
    if (!isRecord(parsed)) {
      throw new MalformedResponseError("Image analysis response is not a JSON object", response.text);
    }
    result = parsed;
  } catch (err) {
    const raw = responseExcerpt(err, 1000);
    return {
      file_name: fileName,
      error:
        err instanceof MalformedResponseError
          ? "Failed to parse LLM response as JSON"
          : `LLM request failed: ${errorMessage(err)}`,
      ...(raw ? { raw_response: raw } : {}),
    };
  }

  result.file_name = fileName;
  const documentId = extractAnalysisId(fileName);
  if (documentId) result.document_id = documentId;
  if (!("processing_metadata" in result)) result.processing_metadata = processingMetadata(options.modelName);
  return result;
}

export async function runImageAnalysis(imagesDir: string, options: AnalyzeImagesOptions): Promise<AnalyzeImagesSummary> {
  let files = listFilesRecursive(imagesDir, isImageFile, {
    onError: (dir, err) => console.log(`  Warning: skipping unreadable directory ${dir}: ${errorMessage(err)}`),
  });
  const summary: AnalyzeImagesSummary = { processed: 0, skipped: 0, failed: 0 };

  if (files.length === 0) {
    console.log(`  No image files found in ${imagesDir}`);
    return summary;
  }
  if (options.limit !== undefined) {
    console.log(`  Limiting to first ${options.limit} file(s)`);
    files = files.slice(0, options.limit);
  }
  console.log(`  Found ${files.length} image file(s)`);

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const outPath = analysisPathFor(file);
    if (options.skipExisting && fs.existsSync(outPath)) {
      console.log(`  Skipping (exists): ${path.basename(outPath)}`);
      summary.skipped++;
      continue;
    }
    console.log(`  [${i + 1}/${files.length}] ${path.relative(imagesDir, file)}`);
    const result = await analyzeImage(file, options);
    try {
      writeJson(outPath, result);
    } catch (err) {
      console.log(`    Warning: could not write ${outPath}: ${errorMessage(err)}`);
      summary.failed++;
      continue;
    }
    if ("error" in result) {
      console.log(`    Warning: ${String(result.error)}`);
      summary.failed++;
    } else {
      summary.processed++;
    }
  }

  return summary;
}
