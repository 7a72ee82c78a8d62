export {
  DefaultArchiveExtractor,
  TarExtractor,
  ZipExtractor,
  detectArchiveFormat,
} from "./archive-extractor.js";
export type { ArchiveExtractor, ArchiveFormat } from "./archive-extractor.js";
