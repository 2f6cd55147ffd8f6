import * as Joi from 'joi';
import { SUPPORTED_BAUD_RATES } from '../modules/relay/relay.types';
import { MAX_INTERVAL_SECONDS } from '../modules/tracker-session/tracker-session.types';

export const validationSchema = Joi.object({
  // Tracking server session
  TRACKER_SERVER_HOST: Joi.string().hostname().allow('').default(''),
  TRACKER_SERVER_PORT: Joi.number().port().default(5023),
  TRACKER_IMEI: Joi.string()
    .pattern(/^\d{15}$/)
    .optional(),
  TRACKER_HEARTBEAT_INTERVAL: Joi.number().integer().min(1).max(MAX_INTERVAL_SECONDS).default(30),
  TRACKER_LOCATION_INTERVAL: Joi.number().integer().min(1).max(MAX_INTERVAL_SECONDS).default(10),
  TRACKER_AUTO_CONNECT: Joi.boolean().default(true),
  CONNECT_TIMEOUT_MS: Joi.number().integer().min(1000).max(60000).default(15000),
  LOGIN_TIMEOUT_SECONDS: Joi.number().integer().min(1).default(30),

  // Reconnect backoff
  RECONNECT_INITIAL_DELAY_MS: Joi.number().integer().min(100).default(5000),
  RECONNECT_MAX_DELAY_MS: Joi.number().integer().min(100).default(60000),
  RECONNECT_MULTIPLIER: Joi.number().min(1).default(2),

  // Wire profile
  GT06_CHECKSUM: Joi.string().valid('xor', 'crc16').default('xor'),
  GT06_LOCATION_PROTOCOL: Joi.string().valid('0x12', '0x22').default('0x12'),
  GT06_COURSE_LAYOUT: Joi.string().valid('sign-bits', 'hemisphere').default('sign-bits'),
  GT06_COMMAND_RESPONSE: Joi.boolean().default(false),

  // Simulated device status
  DEVICE_ACC_ON: Joi.boolean().default(true),
  DEVICE_VOLTAGE_LEVEL: Joi.number().integer().min(0).max(6).default(4),
  DEVICE_GSM_SIGNAL: Joi.number().integer().min(0).max(4).default(4),
  FIXED_LATITUDE: Joi.number().min(-90).max(90).allow('').optional(),
  FIXED_LONGITUDE: Joi.number().min(-180).max(180).allow('').optional(),

  // Relay controller
  RELAY_TRANSPORT: Joi.string().valid('none', 'serial', 'tcp').default('none'),
  RELAY_SERIAL_PATH: Joi.string().when('RELAY_TRANSPORT', {
    is: 'serial',
    then: Joi.required(),
    otherwise: Joi.optional().allow(''),
  }),
  RELAY_BAUD_RATE: Joi.number()
    .valid(...SUPPORTED_BAUD_RATES)
    .default(9600),
  RELAY_HOST: Joi.string().when('RELAY_TRANSPORT', {
    is: 'tcp',
    then: Joi.required(),
    otherwise: Joi.optional().allow(''),
  }),
  RELAY_PORT: Joi.number().port().default(8888),
  RELAY_RETRY_DELAY_MS: Joi.number().integer().min(0).default(500),
  RELAY_MAX_ATTEMPTS: Joi.number().integer().min(1).max(5).default(2),
  RELAY_FORWARD_UNKNOWN: Joi.boolean().default(false),

  // Security
  SECRET_KEY: Joi.string().required(),

  // API Configuration
  API_PORT: Joi.number().default(5055),

  // Application Configuration
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test', 'staging')
    .default('development'),
  LOG_ENABLED: Joi.boolean().default(true),
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'info', 'debug', 'verbose')
    .default('info'),
});
