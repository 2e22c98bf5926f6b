/**
 * BAM header and read-name extraction
 */

export {
  ALIGNMENT_FIXED_SIZE,
  BAM_MAGIC_BYTES,
  ByteStreamReader,
  isValidBAMMagic,
} from "./binary";
export {
  deriveHeaderFields,
  parseSamHeaderText,
  type ReferenceSequence,
  refGenomeFromReferences,
  type SamHeaderLine,
  type SamHeaderType,
  technologyFromPlatform,
} from "./header";
export { type BamContents, type BamReadOptions, readBam } from "./reader";
