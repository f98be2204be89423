/**
 * JSON Schema for the analysis configuration file.
 * Semantic rules (threshold ordering, disjoint lexicon) are checked
 * separately by the config validator.
 */

const termListSchema = {
  type: 'array',
  items: { type: 'string', minLength: 1 }
} as const;

export const AnalysisConfigSchema = {
  type: 'object',
  required: ['feeds', 'monthsBack', 'outputDir', 'requestTimeoutMs', 'relevance', 'lexicon', 'divisor', 'thresholds'],
  properties: {
    feeds: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'url'],
        properties: {
          name: { type: 'string', minLength: 1 },
          url: { type: 'string', minLength: 1 }
        },
        additionalProperties: false
      }
    },
    monthsBack: {
      type: 'integer',
      minimum: 1
    },
    outputDir: {
      type: 'string',
      minLength: 1
    },
    requestTimeoutMs: {
      type: 'integer',
      minimum: 1
    },
    relevance: {
      type: 'object',
      required: ['policy'],
      oneOf: [
        {
          type: 'object',
          properties: {
            policy: { const: 'KEYWORD_SET' },
            keywords: { ...termListSchema, minItems: 1 }
          },
          required: ['policy', 'keywords'],
          additionalProperties: false
        },
        {
          type: 'object',
          properties: {
            policy: { const: 'DUAL_TERM' }
          },
          required: ['policy'],
          additionalProperties: false
        }
      ]
    },
    lexicon: {
      type: 'object',
      required: ['positive', 'negative'],
      properties: {
        positive: termListSchema,
        negative: termListSchema
      },
      additionalProperties: false
    },
    divisor: {
      type: 'number',
      exclusiveMinimum: 0
    },
    thresholds: {
      type: 'array',
      items: {
        type: 'object',
        required: ['label', 'lowerBound'],
        properties: {
          label: {
            type: 'string',
            enum: ['very_positive', 'positive', 'neutral', 'negative', 'very_negative']
          },
          lowerBound: { type: ['number', 'null'] }
        },
        additionalProperties: false
      }
    }
  },
  additionalProperties: false
} as const;
