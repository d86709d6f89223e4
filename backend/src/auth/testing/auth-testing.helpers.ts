// Helper dùng chung cho các spec cần chạy pipeline xác thực thật
// (PassportModule + JwtStrategy) mà không cần MongoDB:
// UsersService được thay bằng bản fake giữ user trong memory

import { INestApplication, Provider, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule, JwtService } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { Types } from 'mongoose';
import cookieParser from 'cookie-parser';
import { JwtStrategy } from '../strategies/jwt.strategy';
import { UsersService } from '../../users/users.service';
import type { AccessTokenPayload } from '../interfaces/jwt-payload.interface';

export const TEST_ACCESS_SECRET = 'test-access-secret';
export const TEST_REFRESH_SECRET = 'test-refresh-secret';

export interface FakeUser {
  id: string;
  email: string;
  isStaff: boolean;
  isActive: boolean;
}

export function fakeUser(overrides: Partial<FakeUser> = {}): FakeUser {
  return {
    id: new Types.ObjectId().toString(),
    email: 'user@test.com',
    isStaff: false,
    isActive: true,
    ...overrides,
  };
}

export function testConfigService(): ConfigService {
  return new ConfigService({
    auth: {
      jwt: {
        accessSecret: TEST_ACCESS_SECRET,
        accessExpiresIn: '15m',
        refreshSecret: TEST_REFRESH_SECRET,
        refreshExpiresIn: '1d',
      },
    },
    media: { root: './media', url: '/media/' },
  });
}

export const authTestingImports = [
  PassportModule,
  JwtModule.register({
    secret: TEST_ACCESS_SECRET,
    signOptions: { expiresIn: '15m' },
  }),
];

// JwtStrategy thật + UsersService fake có findById (thứ strategy cần)
// usersService: các method khác mà controller đang test gọi tới
export function authTestingProviders(
  users: FakeUser[],
  usersService: Record<string, unknown> = {},
): Provider[] {
  return [
    JwtStrategy,
    { provide: ConfigService, useValue: testConfigService() },
    {
      provide: UsersService,
      useValue: {
        findById: async (id: string) => {
          const user = users.find((candidate) => candidate.id === id);
          return user
            ? {
                _id: new Types.ObjectId(user.id),
                email: user.email,
                isStaff: user.isStaff,
                isActive: user.isActive,
              }
            : null;
        },
        ...usersService,
      },
    },
  ];
}

export function signAccessToken(jwtService: JwtService, user: FakeUser): string {
  const payload: AccessTokenPayload = {
    sub: user.id,
    email: user.email,
    isStaff: user.isStaff,
    type: 'access',
  };
  return jwtService.sign(payload);
}

// Cấu hình giống main.ts để test đi qua cùng pipeline
export function configureTestApp(app: INestApplication): INestApplication {
  app.use(cookieParser());
  app.setGlobalPrefix('api');
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
  return app;
}
