/**
 * Error handling for manifest-driven metadata extraction
 *
 * Low-level errors (file, network, compression, stream, binary parsing)
 * describe what went wrong where. The pipeline folds them into the three
 * reportable kinds written to the output: UnreadableFile, ExtractionFailure
 * and MalformedManifest.
 */

/**
 * Error kinds recorded per manifest entry
 */
export type ErrorKind = "UnreadableFile" | "ExtractionFailure" | "MalformedManifest";

/**
 * Base error class for all readtrail errors
 */
export class ReadtrailError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "ReadtrailError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or values
 */
export class ValidationError extends ReadtrailError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends ReadtrailError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * BAM format errors with binary offset context
 */
export class BamError extends ParseError {
  constructor(
    message: string,
    public readonly section: "magic" | "header" | "references" | "alignment",
    public readonly byteOffset?: number,
    context?: string
  ) {
    super(message, "BAM", undefined, context);
    this.name = "BamError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.byteOffset !== undefined) {
      msg += `\nByte offset: ${this.byteOffset}`;
    }
    return msg;
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends ReadtrailError {
  constructor(
    message: string,
    public readonly format: "gzip" | "zstd" | "none",
    public readonly operation: "detect" | "decompress" | "stream",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from a thrown value
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = messageOf(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("eof") || msg.includes("truncated") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }
    return msg;
  }
}

/**
 * File I/O errors with the failing operation and system error attached
 */
export class FileError extends ReadtrailError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = messageOf(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Lower the worker count or raise the open file limit";
    }

    return undefined;
  }
}

/**
 * Remote retrieval errors
 */
export class NetworkError extends ReadtrailError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    context?: string
  ) {
    super(message, "NETWORK_ERROR", undefined, context);
    this.name = "NetworkError";
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends ReadtrailError {
  constructor(
    message: string,
    public readonly streamType: "read" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors for streaming operations
 */
export class BufferError extends ReadtrailError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * Timeout errors for remote reads
 */
export class TimeoutError extends ReadtrailError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    public readonly operation: "connect" | "read",
    context?: string
  ) {
    super(message, "TIMEOUT_ERROR", undefined, context);
    this.name = "TimeoutError";
  }
}

/**
 * A source could not be opened, fetched, decompressed or read to the end
 * of its sample. Recorded per file; the run continues.
 */
export class UnreadableFileError extends ReadtrailError {
  readonly kind = "UnreadableFile" as const;

  constructor(
    message: string,
    public readonly location: string,
    public override readonly cause?: unknown
  ) {
    super(message, "UNREADABLE_FILE", undefined, location);
    this.name = "UnreadableFileError";
  }

  /**
   * Wrap any failure raised while reading a source
   */
  static from(location: string, error: unknown): UnreadableFileError {
    if (error instanceof UnreadableFileError) return error;
    return new UnreadableFileError(messageOf(error), location, error);
  }
}

/**
 * A grammar's extractor raised on a line its recognizer accepted.
 * Points at a grammar bug; recorded per file.
 */
export class ExtractionFailureError extends ReadtrailError {
  readonly kind = "ExtractionFailure" as const;

  constructor(
    message: string,
    public readonly grammarId: string,
    public readonly line: string,
    public override readonly cause?: unknown
  ) {
    super(message, "EXTRACTION_FAILURE", undefined, `grammar ${grammarId}: ${line}`);
    this.name = "ExtractionFailureError";
  }
}

/**
 * The manifest is missing, unreadable, or lacks required columns.
 * Fatal: the run stops before any entry is processed.
 */
export class MalformedManifestError extends ReadtrailError {
  readonly kind = "MalformedManifest" as const;

  constructor(
    message: string,
    public readonly manifestPath: string,
    lineNumber?: number,
    public override readonly cause?: unknown
  ) {
    super(message, "MALFORMED_MANIFEST", lineNumber, manifestPath);
    this.name = "MalformedManifestError";
  }
}

/**
 * Errors that are recorded against a single manifest entry
 */
export type EntryError = UnreadableFileError | ExtractionFailureError;

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
