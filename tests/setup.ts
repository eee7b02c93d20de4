import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
dotenv.config({ path: '.env.test' });

process.env.NODE_ENV = 'test';
process.env.JWT_ACCESS_SECRET = 'test-secret';
process.env.BCRYPT_SALT_ROUNDS = '4';
delete process.env.EMAIL_HOST;
// Uploaded result sheets land outside the working tree
process.env.UPLOAD_DIR = path.join(os.tmpdir(), 'placement-portal-test-uploads');

jest.setTimeout(30000);
