import crypto from 'crypto';

export const hashToken = (token: string): string => {
  return crypto.createHash('sha256').update(token).digest('hex');
};

export const generateOTP = (length = 6): string => {
  let otp = '';
  for (let i = 0; i < length; i++) {
    otp += crypto.randomInt(0, 10).toString();
  }
  return otp;
};

export const roundTo = (value: number, decimals = 2): number => {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
};

export const normalizeRollNo = (rollNo: string): string => {
  return rollNo.trim().toUpperCase().replace(/\s+/g, '');
};

export const normalizeBranch = (branch: string): string => {
  return branch.trim().toUpperCase();
};

export const sanitizeFilename = (filename: string): string => {
  return filename.replace(/[^a-zA-Z0-9.-]/g, '_');
};

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Formats a date as `YYYY-MM-DD HH:mm:ss` in UTC.
 */
export const formatTimestamp = (date: Date): string => {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
};

export const compactTimestamp = (date: Date): string => {
  return formatTimestamp(date).replace(/[-: ]/g, '');
};
