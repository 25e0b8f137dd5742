/**
 * Transform stage: raw download → processed WebP.
 *
 * Fixed pipeline, in order:
 *   flatten onto white → crop_box → upscale to max_processing_dimension →
 *   autocontrast → sharpness / contrast / brightness / color →
 *   unsharp_mask → downscale to fit resize_to → WebP encode
 *
 * Every optional step renders to an intermediate lossless frame. A step that
 * throws is logged and skipped; the previous frame carries on. Decode,
 * settings and encode failures fail the item and leave no output file.
 */

import { rename, rm, writeFile } from 'fs/promises';
import sharp, { type Sharp } from 'sharp';
import { z } from 'zod';
import type { SyncContext } from '../../shared/context';
import { errorMessage } from '../../shared/errors';
import type { Logger } from '../../shared/logging/logger';
import type { SettingsRecord, TransformOutcome } from '../../shared/types';

export interface ImageTransformer {
  transform(rawPath: string, outputPath: string, settings: SettingsRecord): Promise<TransformOutcome>;
}

// ============================================================================
// Settings
// ============================================================================

const factor = z.coerce.number().min(0).default(1);
const dimension = z.coerce.number().positive();

export const ProcessingSchema = z
  .object({
    crop_box: z.array(z.coerce.number()).length(4).nullable().optional(),
    max_processing_dimension: dimension.default(4000),
    enhancements: z
      .object({
        apply_autocontrast: z.boolean().default(false),
        sharpness: factor,
        contrast: factor,
        brightness: factor,
        color: factor,
      })
      .passthrough()
      .nullable()
      .default({}),
    unsharp_mask: z
      .union([
        z.literal(false),
        z.null(),
        z.object({
          radius: dimension.default(2),
          percent: z.coerce.number().min(0).default(150),
          threshold: z.coerce.number().min(0).default(3),
        }),
      ])
      .optional(),
    resize_to: z.tuple([dimension, dimension]).nullable().default([1920, 1920]),
    quality: z.coerce.number().int().min(1).max(100).default(60),
  })
  .passthrough();

export type ProcessingSettings = z.infer<typeof ProcessingSchema>;

export function parseProcessingSettings(settings: SettingsRecord): ProcessingSettings {
  const parsed = ProcessingSchema.safeParse(settings);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`invalid processing settings: ${issues.join('; ')}`);
  }
  return parsed.data;
}

// ============================================================================
// Geometry (integer sizes, truncated)
// ============================================================================

export interface Size {
  width: number;
  height: number;
}

/** Size after scaling the longest side up to `maxDim`; null when already that large. */
export function upscaleSize(size: Size, maxDim: number): Size | null {
  const scale = maxDim / Math.max(size.width, size.height);
  if (scale <= 1) return null;
  return { width: Math.trunc(size.width * scale), height: Math.trunc(size.height * scale) };
}

/** Size after fitting inside `target`; null when it already fits. */
export function downscaleSize(size: Size, target: readonly [number, number]): Size | null {
  const scale = Math.min(target[0] / size.width, target[1] / size.height);
  if (scale >= 1) return null;
  return {
    width: Math.max(1, Math.trunc(size.width * scale)),
    height: Math.max(1, Math.trunc(size.height * scale)),
  };
}

// ============================================================================
// Frames
// ============================================================================

interface Frame extends Size {
  data: Buffer;
}

type StepResult = { ok: true; frame: Frame } | { ok: false; error: string };

async function render(input: Buffer | string, apply: (img: Sharp) => Sharp): Promise<Frame> {
  const { data, info } = await apply(sharp(input))
    .png({ compressionLevel: 0 })
    .toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}

async function tryStep(frame: Frame, apply: (img: Sharp) => Sharp): Promise<StepResult> {
  try {
    return { ok: true, frame: await render(frame.data, apply) };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

/** Apply one optional step; on failure keep the previous frame. */
async function optionalStep(log: Logger, name: string, frame: Frame, apply: (img: Sharp) => Sharp): Promise<Frame> {
  const res = await tryStep(frame, apply);
  if (!res.ok) {
    log.warn(`could not apply ${name}`, { error: res.error });
    return frame;
  }
  log.debug(`applied ${name}`, { width: res.frame.width, height: res.frame.height });
  return res.frame;
}

function sharpnessOp(f: number): (img: Sharp) => Sharp {
  if (f > 1) return (img) => img.sharpen({ sigma: f - 1 + 0.5 });
  return (img) => img.blur(0.3 + (1 - f) * 2);
}

async function runPipeline(log: Logger, rawPath: string, s: ProcessingSettings): Promise<Frame> {
  let frame = await render(rawPath, (img) => img.flatten({ background: '#ffffff' }));
  log.info('processing', { width: frame.width, height: frame.height });

  if (s.crop_box) {
    const [left, top, right, bottom] = s.crop_box.map((v) => Math.trunc(v));
    frame = await optionalStep(log, `crop ${JSON.stringify(s.crop_box)}`, frame, (img) =>
      img.extract({ left, top, width: right - left, height: bottom - top })
    );
  }

  const up = upscaleSize(frame, s.max_processing_dimension);
  if (up) {
    frame = await optionalStep(log, 'upscale', frame, (img) =>
      img.resize(up.width, up.height, { fit: 'fill', kernel: 'lanczos3' })
    );
  }

  const enh = s.enhancements;
  if (enh) {
    if (enh.apply_autocontrast) {
      frame = await optionalStep(log, 'autocontrast', frame, (img) => img.normalise());
    }
    if (enh.sharpness !== 1) {
      frame = await optionalStep(log, 'sharpness', frame, sharpnessOp(enh.sharpness));
    }
    if (enh.contrast !== 1) {
      const f = enh.contrast;
      frame = await optionalStep(log, 'contrast', frame, (img) => img.linear(f, 128 * (1 - f)));
    }
    if (enh.brightness !== 1) {
      const f = enh.brightness;
      frame = await optionalStep(log, 'brightness', frame, (img) => img.modulate({ brightness: f }));
    }
    if (enh.color !== 1) {
      const f = enh.color;
      frame = await optionalStep(log, 'color', frame, (img) => img.modulate({ saturation: f }));
    }
  }

  const mask = s.unsharp_mask;
  if (mask) {
    frame = await optionalStep(log, 'unsharp mask', frame, (img) =>
      img.sharpen({ sigma: mask.radius, m1: 1, m2: (mask.percent / 100) * 2, x1: mask.threshold })
    );
  }

  const down = s.resize_to ? downscaleSize(frame, s.resize_to) : null;
  if (down) {
    frame = await optionalStep(log, 'downscale', frame, (img) =>
      img.resize(down.width, down.height, { fit: 'fill', kernel: 'lanczos3' })
    );
  }
  return frame;
}

async function encodeWebp(frame: Frame, outputPath: string, quality: number): Promise<Size> {
  const { data, info } = await sharp(frame.data)
    .webp({ quality, effort: 6 })
    .toBuffer({ resolveWithObject: true });
  const tmp = `${outputPath}.tmp`;
  try {
    await writeFile(tmp, data);
    await rename(tmp, outputPath);
  } catch (e) {
    await rm(tmp, { force: true });
    throw e;
  }
  return { width: info.width, height: info.height };
}

export function createSharpTransformer(ctx: SyncContext): ImageTransformer {
  const log = ctx.log.scope('transform');
  return {
    async transform(rawPath, outputPath, settings) {
      let parsed: ProcessingSettings;
      try {
        parsed = parseProcessingSettings(settings);
      } catch (e) {
        log.error('rejected settings', { rawPath, error: errorMessage(e) });
        return { ok: false, error: errorMessage(e) };
      }

      let frame: Frame;
      try {
        frame = await runPipeline(log, rawPath, parsed);
      } catch (e) {
        log.error('could not decode image', { rawPath, error: errorMessage(e) });
        return { ok: false, error: `decode failed: ${errorMessage(e)}` };
      }

      try {
        const size = await encodeWebp(frame, outputPath, parsed.quality);
        log.info('saved processed image', { path: outputPath, width: size.width, height: size.height });
        return { ok: true, path: outputPath, ...size };
      } catch (e) {
        log.error('could not save processed image', { path: outputPath, error: errorMessage(e) });
        return { ok: false, error: `encode failed: ${errorMessage(e)}` };
      }
    },
  };
}
