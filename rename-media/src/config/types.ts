/** Device classification used in canonical names */
export type Device = "iphone" | "android";

/** Where a device label came from */
export type DeviceSource = "embedded-metadata" | "extension-heuristic";

/** Where a capture instant came from */
export type TimestampSource = "embedded-metadata" | "filesystem-mtime";

/**
 * Which files a run considers and how the device is detected.
 * - `videos`: .mov/.mp4 only, device from extension
 * - `media`: videos plus .heic/.jpg/.jpeg, device from exiftool tags
 */
export type Variant = "videos" | "media";

export interface VariantDefinition {
  /** Lower-cased extensions (with dot) mapped to their default device */
  extensions: Record<string, Device>;

  /** Whether to ask exiftool for Make/Model before falling back to the extension */
  detectDeviceFromMetadata: boolean;
}

/**
 * Fully resolved options for one rename run
 */
export interface RenameOptions {
  /** Absolute path of the directory to process */
  directory: string;

  variant: Variant;

  /** Report planned renames without touching the filesystem */
  dryRun: boolean;

  /** Token written into names for each device */
  prefixes: Record<Device, string>;

  /** IANA zone the capture instant is displayed in */
  timeZone: string;

  /** External tool commands */
  tools: {
    exiftool: string;
    ffprobe: string;
  };
}

/** Callback for per-file report lines */
export type ProgressCallback = (message: string) => void;
