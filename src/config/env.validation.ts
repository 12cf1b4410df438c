import Joi from 'joi';

import { FALSE_WORDS, TRUE_WORDS } from '../utils/parse-boolean';

const booleanFlag = () =>
  Joi.boolean()
    .truthy(...TRUE_WORDS)
    .falsy(...FALSE_WORDS)
    .default(false);

export const envValidationSchema = Joi.object({
  PORT: Joi.number().port().default(3000),
  LOG_LEVEL: Joi.string().valid('fatal', 'error', 'warn', 'info', 'debug', 'trace').default('info'),
  // Max JSON body size in bytes enforced by Fastify; synthesis payloads are small.
  REQUEST_BODY_LIMIT: Joi.number().integer().min(1024).default(65536),
  REDIS_URL: Joi.string().uri().default('redis://localhost:6379'),
  CACHE_TTL_DEFAULT: Joi.number().integer().min(1).default(300),
  CACHE_DEBUG: booleanFlag(),
  API_KEYS_REDIS_PREFIX: Joi.string().default('speech-gateway'),
  // Mixed into every key hash; a database dump without it yields no usable keys.
  API_KEYS_HASH_PEPPER: Joi.string().min(16).required(),
  API_KEYS_DEFAULT_PLAN: Joi.string()
    .valid('free', 'starter', 'professional', 'enterprise')
    .default('free'),
  API_KEYS_MAX_RATE_LIMIT: Joi.number().integer().positive().default(1000),
  // Pre-auth and admin throttles; per-key limits come from the key record.
  API_KEYS_RATE_LIMIT_WINDOW_SECONDS: Joi.number().integer().positive().default(60),
  API_KEYS_RATE_LIMIT_MAX_REQUESTS: Joi.number().integer().positive().default(120),
  // Single admin credential for the key-management API; empty disables it.
  ADMIN_API_TOKEN: Joi.string().allow('').default(''),
  SYNTHESIS_PROVIDER: Joi.string().valid('remote', 'tone').default('remote'),
  SYNTHESIS_TIMEOUT_MS: Joi.number().integer().min(100).default(45000),
  SYNTHESIS_MAX_TEXT_LENGTH: Joi.number().integer().min(1).max(10000).default(1000),
  // Seconds a synthesized clip stays cached; 0 turns the audio cache off.
  SYNTHESIS_CACHE_TTL: Joi.number().integer().min(0).default(3600),
  // Origin-only so the provider path maps 1:1 onto the engine.
  TTS_BACKEND_URL: Joi.string()
    .uri()
    .default('http://127.0.0.1:5051')
    .custom((value, helpers) => {
      try {
        const parsed = new URL(value);
        if (parsed.pathname && parsed.pathname !== '/') {
          return helpers.error('any.custom');
        }
        return value;
      } catch {
        return helpers.error('any.custom');
      }
    }, 'Backend URL validation')
    .messages({
      'any.custom': 'TTS_BACKEND_URL must not include a path',
    }),
  TTS_BACKEND_TIMEOUT: Joi.number().integer().min(100).default(30000),
  TTS_BACKEND_RETRIES: Joi.number().integer().min(0).max(3).default(1),
});
