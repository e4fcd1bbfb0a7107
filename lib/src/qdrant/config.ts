/**
 * Qdrant Configuration
 *
 * Connection settings and collection names for the legal corpus. Values are
 * read from environment variables by `loadQdrantConfig`.
 */

import { z } from 'zod';

import { ConfigurationError } from '../errors/index.js';

// =============================================================================
// Distance Metric
// =============================================================================

export const QdrantDistance = {
  COSINE: 'Cosine',
  EUCLID: 'Euclid',
  DOT: 'Dot',
  MANHATTAN: 'Manhattan',
} as const;

export type QdrantDistance = (typeof QdrantDistance)[keyof typeof QdrantDistance];

const DISTANCE_ALIASES: Record<string, QdrantDistance> = {
  cosine: QdrantDistance.COSINE,
  euclid: QdrantDistance.EUCLID,
  euclidean: QdrantDistance.EUCLID,
  dot: QdrantDistance.DOT,
  manhattan: QdrantDistance.MANHATTAN,
};

/**
 * Accepts the Qdrant spelling or a lowercase alias ("cosine", "euclidean")
 */
export const QdrantDistanceSchema = z.preprocess(
  (value) =>
    typeof value === 'string' ? (DISTANCE_ALIASES[value.trim().toLowerCase()] ?? value) : value,
  z.enum(['Cosine', 'Euclid', 'Dot', 'Manhattan'])
);

// =============================================================================
// Main Configuration Schema
// =============================================================================

export const QdrantConfigSchema = z.object({
  /** Qdrant server URL */
  url: z.string().url().default('http://localhost:6333'),

  /** API key; local servers usually run without one */
  apiKey: z.string().min(1).optional(),

  /** Collection of question/answer records */
  qaCollection: z.string().min(1).default('legal_qa'),

  /** Collection of legal document chunks */
  docCollection: z.string().min(1).default('legal_doc'),

  /** Vector dimensions (must match the embedding provider) */
  vectorSize: z.coerce.number().int().positive().default(1024),

  /** Distance metric for new collections */
  distance: QdrantDistanceSchema.default('Cosine'),

  /** Store payloads on disk when creating collections */
  onDiskPayload: z.boolean().default(true),

  /** Request timeout in milliseconds */
  timeout: z.coerce.number().int().positive().default(15000),
});

export type QdrantConfig = z.infer<typeof QdrantConfigSchema>;
export type QdrantConfigInput = z.input<typeof QdrantConfigSchema>;

export function createDefaultQdrantConfig(overrides?: QdrantConfigInput): QdrantConfig {
  return parseQdrantConfig(overrides ?? {});
}

/**
 * @throws {ConfigurationError} listing every schema violation
 */
export function parseQdrantConfig(config: unknown): QdrantConfig {
  const result = QdrantConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid Qdrant configuration: ${issues.join(', ')}`, {
      issues,
    });
  }
  return result.data;
}

/**
 * Loads Qdrant configuration from environment variables.
 *
 * - QDRANT_URL, QDRANT_API_KEY
 * - QDRANT_QA_COLLECTION (default: 'legal_qa'), QDRANT_DOC_COLLECTION (default: 'legal_doc')
 * - QDRANT_DISTANCE (default: cosine)
 * - QDRANT_VECTOR_SIZE, falling back to EMBEDDING_DIMENSIONS
 * - QDRANT_TIMEOUT in milliseconds
 *
 * @throws {ConfigurationError} if a variable is present but invalid
 */
export function loadQdrantConfig(env: NodeJS.ProcessEnv = process.env): QdrantConfig {
  return parseQdrantConfig({
    url: env['QDRANT_URL'] || undefined,
    apiKey: env['QDRANT_API_KEY'] || undefined,
    qaCollection: env['QDRANT_QA_COLLECTION'] || undefined,
    docCollection: env['QDRANT_DOC_COLLECTION'] || undefined,
    vectorSize: env['QDRANT_VECTOR_SIZE'] || env['EMBEDDING_DIMENSIONS'] || undefined,
    distance: env['QDRANT_DISTANCE'] || undefined,
    timeout: env['QDRANT_TIMEOUT'] || undefined,
  });
}
