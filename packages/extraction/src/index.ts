export { PlainTextTierClient, TEXT_MIME_TYPES, stripHtml } from "./text-client.js";
export { DoclingTierClient, DOCLING_MIME_TYPES, parseDoclingOutput } from "./docling-client.js";
export type { DoclingTierClientOptions } from "./docling-client.js";
export {
  VisionTierClient,
  VISION_MIME_TYPES,
  PAGE_BREAK_MARKER,
  DEFAULT_VISION_BACKOFF,
  splitPages,
} from "./vision-client.js";
export type { VisionTierClientOptions, VisionBackoffPolicy } from "./vision-client.js";
export { MimeRoutedTierClient } from "./mime-routed-client.js";
export { createTierClients } from "./factory.js";
export type { CreateTierClientsOptions } from "./factory.js";
export {
  cleanExtractedText,
  cleanMarkdownArtifacts,
  removeGlyphArtifacts,
  removeNoise,
} from "./text-cleaner.js";
