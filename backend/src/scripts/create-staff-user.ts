/**
 * Tạo (hoặc nâng quyền) tài khoản staff
 *
 * Usage: npm run build && STAFF_EMAIL=admin@cinema.local STAFF_PASSWORD=... npm run create-staff-user
 *
 * Dùng chung .env với app (MONGODB_URI, JWT_*...) vì script khởi động AppModule
 * ở chế độ application context (không mở HTTP port)
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from '../app.module';
import { UsersService } from '../users/users.service';

const logger = new Logger('CreateStaffUser');

async function run() {
  const email = process.env.STAFF_EMAIL;
  const password = process.env.STAFF_PASSWORD;

  if (!email || !password) {
    throw new Error('STAFF_EMAIL and STAFF_PASSWORD must be set');
  }
  if (password.length < 5) {
    throw new Error('STAFF_PASSWORD must be at least 5 characters long');
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  try {
    const staff = await app.get(UsersService).upsertStaff(email, password);
    logger.log(`Staff user ${staff.email} (${staff.id}) is ready`);
  } finally {
    await app.close();
  }
}

run().catch((error) => {
  logger.error('Failed to create staff user', error);
  process.exit(1);
});
