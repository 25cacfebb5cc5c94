/**
 * Shared constants across the application
 */

// ============================================================================
// Wire Format
// ============================================================================

export const RECORD_BEGIN = '--BEGIN ';
export const RECORD_END = '--END ';
export const ENCRYPTED_MARKER = 'ENCRYPTED ';
export const PART_PREFIX = 'part_';
export const PART_SEPARATOR = '_of_';
export const FIELD_FILE = ' file: ';
export const FIELD_CHUNK_HASH = ' chunk_hash: ';
export const FIELD_FILE_HASH = ' file_hash: ';
export const MARKER_CLOSE = '--';

// Index/total are zero-padded to at least this many digits
export const PART_NUMBER_WIDTH = 2;
// Upper bound on a declared part total
export const MAX_PARTS = 99999;

// ============================================================================
// Integrity
// ============================================================================

export const HASH_ALGORITHM = 'sha256';
export const CHUNK_HASH_LENGTH = 16; // hex chars
export const FILE_HASH_LENGTH = 64; // hex chars

// ============================================================================
// Encryption
// ============================================================================

export const CIPHER_ALGORITHM = 'aes-256-cbc';
export const PBKDF2_ITERATIONS = 100000;
export const PBKDF2_DIGEST = 'sha256';
export const KEY_LENGTH = 32; // 256 bits
export const SALT_LENGTH = 16;
export const IV_LENGTH = 16;
export const BLOCK_SIZE = 16;
export const MIN_PASSWORD_LENGTH = 8;
export const DEFAULT_PASSWORD_ATTEMPTS = 3;

// ============================================================================
// Chunking Configuration
// ============================================================================

// A version 40-L QR symbol holds ~2953 bytes in byte mode
export const DEFAULT_MAX_PAYLOAD_BYTES = 2953;
// Leaves room for the record header and footer
export const DEFAULT_SAFETY_MARGIN = 0.8;
export const DEFAULT_CAPACITY_THRESHOLD = 100;
// Files larger than this are chunked from a line stream
export const STREAMING_THRESHOLD_BYTES = 100 * 1024 * 1024;

// ============================================================================
// Parallel Encoding
// ============================================================================

// Inputs with more chunks than this go through the worker pool
export const DEFAULT_PARALLEL_THRESHOLD = 3;
export const MAX_POOL_SIZE = 8;
export const POOL_SIZE_CORE_BONUS = 2;

// ============================================================================
// Symbol Rendering
// ============================================================================

export const ERROR_CORRECTION_LEVELS = ['L', 'M', 'Q', 'H'] as const;
export const DEFAULT_BOX_SIZE = 10; // pixels per module
export const DEFAULT_BORDER = 4; // modules of quiet zone
export const DEFAULT_ERROR_CORRECTION = 'L';

// ============================================================================
// File Names
// ============================================================================

export const CHUNK_FILE_EXTENSION = '.txt';
export const ENCRYPTED_STEM_SUFFIX = '_encrypted';
export const SCANNED_CHUNK_INFIX = '_chunk_';
export const SCANNED_CHUNK_NUMBER_WIDTH = 3;
export const SCAN_REPORT_FILENAME = 'scan_report.json';
export const DEFAULT_CHUNK_DIR = 'scanned_chunks';
export const CONFIG_DIR_NAME = 'airgap-transfer';
export const CONFIG_FILENAME = 'config.json';
export const SAMPLE_CONFIG_FILENAME = 'airgap-config-sample.json';
export const LOGS_DIR = '.airgap/logs';

export const UTF8_BOM = '\uFEFF';
