import type { Device, Variant, VariantDefinition } from "./types.js";

/** Device tokens used when no prefix override is given */
export const DEFAULT_PREFIXES: Record<Device, string> = {
  iphone: "iphone",
  android: "android",
};

export const DEFAULT_TIME_ZONE = "America/Los_Angeles";

export const DEFAULT_TOOLS = {
  exiftool: "exiftool",
  ffprobe: "ffprobe",
};

const VIDEO_EXTENSIONS: Record<string, Device> = {
  ".mov": "iphone",
  ".mp4": "android",
};

/**
 * Extension sets and detection strategy per variant
 */
export const VARIANTS: Record<Variant, VariantDefinition> = {
  videos: {
    extensions: VIDEO_EXTENSIONS,
    detectDeviceFromMetadata: false,
  },
  media: {
    extensions: {
      ...VIDEO_EXTENSIONS,
      ".heic": "iphone",
      ".jpg": "android",
      ".jpeg": "android",
    },
    detectDeviceFromMetadata: true,
  },
};
