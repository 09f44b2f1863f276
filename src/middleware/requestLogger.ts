import pino from 'pino';
import pinoHttp from 'pino-http';
import { RequestHandler } from 'express';
import logger from '../utils/logger';

export const requestLogger = pinoHttp({
  logger,
  serializers: { err: pino.stdSerializers.err },
}) as unknown as RequestHandler;
