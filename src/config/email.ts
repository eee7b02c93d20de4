import nodemailer, { Transporter } from 'nodemailer';
import logger from './logger';

let transporter: Transporter | null = null;

const initializeEmail = (): void => {
  const emailHost = process.env.EMAIL_HOST;
  const emailPort = parseInt(process.env.EMAIL_PORT || '587');
  const emailUser = process.env.EMAIL_USER;
  const emailPassword = process.env.EMAIL_PASSWORD;

  if (!emailHost) {
    logger.warn('EMAIL_HOST not configured, status notifications will be logged but not delivered');
    return;
  }

  const secure = emailPort === 465;
  logger.info(`Initializing email transporter host=${emailHost} port=${emailPort} secure=${secure}`);

  transporter = nodemailer.createTransport({
    host: emailHost,
    port: emailPort,
    secure,
    ...(emailUser && {
      auth: {
        user: emailUser,
        pass: emailPassword || '',
      },
    }),
    ...(secure ? {} : { requireTLS: process.env.EMAIL_REQUIRE_TLS !== 'false' }),
    connectionTimeout: 15000,
    greetingTimeout: 15000,
    socketTimeout: 15000,
  });

  transporter.verify((error) => {
    if (error) {
      logger.error('Email configuration error (verify failed):', error);
    } else {
      logger.info('Email transporter initialized successfully');
    }
  });
};

export const getEmailTransporter = (): Transporter | null => {
  return transporter;
};

export default initializeEmail;
