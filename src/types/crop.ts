export type Channels = 1 | 2 | 3 | 4;

/**
 * Axis-aligned crop region in pixel coordinates (half-open: right and bottom are exclusive).
 */
export interface Rectangle {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Crop region as the drawing widget reports it.
 */
export interface CropBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface Bounds {
  width: number;
  height: number;
}

/**
 * Decoded raster kept as raw RGBA bytes between decode and encode.
 */
export interface RasterImage {
  data: Buffer;
  width: number;
  height: number;
  channels: Channels;
  // Whether the source carried an alpha channel; opaque sources are encoded without one
  hasAlpha: boolean;
}

export type OutputFormat = 'PNG' | 'JPEG' | 'WEBP' | 'GIF' | 'TIFF' | 'AVIF';

export type NamingStyle = 'suffix' | 'prefix';

export interface NamingConvention {
  style: NamingStyle;
  token: string;
}

export interface BatchItem {
  name: string;
  bytes: Buffer;
  declaredType?: string;
}

export interface BatchJob {
  items: BatchItem[];
  rectangle: Rectangle;
  // Degrees in [-180, 180], 0 = no rotation
  angle: number;
  naming: NamingConvention;
  // Post-rotation size of the reference image, when known
  bounds?: Bounds;
}

export interface ArchiveEntry {
  name: string;
  data: Buffer;
}

export type ImageErrorKind =
  | 'InvalidRectangle'
  | 'DecodeFailure'
  | 'TransformFailure'
  | 'OutOfBounds'
  | 'EncodeFailure';

export interface ItemFailure {
  name: string;
  kind: ImageErrorKind;
  message: string;
}

export interface BatchProgress {
  completed: number;
  total: number;
  fraction: number;
  name: string;
  ok: boolean;
}

export interface BatchHooks {
  onProgress?: (progress: BatchProgress) => void;
  signal?: AbortSignal;
}

export interface BatchOutcome {
  entries: ArchiveEntry[];
  failures: ItemFailure[];
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: ItemFailure[];
  message: string;
}

export interface CropBatchRequest {
  items: BatchItem[];
  rectangle: Rectangle;
  angle: number;
  naming?: NamingConvention;
  // Name of the item the rectangle was drawn against; the first item when absent
  reference?: string;
  // Bound raw coordinates to the rotated reference before validating
  clampToReference?: boolean;
}

export interface CropBatchResult {
  archive: Buffer;
  archiveName: string;
  entries: string[];
  failures: ItemFailure[];
  summary: BatchSummary;
}

export interface ReferenceInfo {
  name: string;
  original: Bounds;
  rotated: Bounds;
  angle: number;
  defaultRectangle: Rectangle;
  defaultBox: CropBox;
}

export interface PreviewResult {
  data: Buffer;
  mimeType: string;
  format: OutputFormat;
  width: number;
  height: number;
}
