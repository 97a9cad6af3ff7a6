import * as Joi from 'joi';

export const envValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),

  // Lowest Nest log level printed by the command line
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'log', 'debug', 'verbose')
    .default('warn'),

  // Region table
  REGION_DATA_PATH: Joi.string().optional(),

  // Fake number generation
  FAKE_MAX_AGE: Joi.number().integer().min(1).max(150).default(100),
});
