import * as Joi from 'joi';

export const validationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  LEDGER_ACCESS_TOKEN: Joi.string().required().messages({
    'any.required': 'LEDGER_ACCESS_TOKEN is required to call the accounting API',
  }),
  LEDGER_API_URL: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .optional(),
  LEDGER_SANDBOX: Joi.string()
    .valid('true', 'false', '1', '0')
    .default('false'),
  LEDGER_USER_AGENT: Joi.string().default('ledger-client/1.0'),
  CACHE_ENABLED: Joi.string()
    .valid('true', 'false', '1', '0')
    .default('true'),
  CACHE_NAMESPACE: Joi.string().default('ledger'),
  CACHE_TTL: Joi.number().min(1).default(300),
  CACHE_REDIS_URL: Joi.string()
    .uri({ scheme: ['redis', 'rediss'] })
    .allow('')
    .optional(),
});
