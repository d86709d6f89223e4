// File này dùng để kiểm tra (validate) biến môi trường khi app khởi động.
// Nếu thiếu hoặc sai kiểu dữ liệu, app sẽ báo lỗi ngay lúc boot.

import { plainToInstance } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  validateSync,
} from 'class-validator';

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

// Lớp này mô tả "hợp đồng" cho các biến môi trường mà app cần
class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsNumber()
  PORT: number = 3000;

  @IsString()
  @IsNotEmpty()
  MONGODB_URI!: string;

  // Secret ký access token bắt buộc phải có
  @IsString()
  @IsNotEmpty()
  JWT_ACCESS_SECRET!: string;

  @IsString()
  @IsOptional()
  JWT_ACCESS_EXPIRES?: string = '15m';

  @IsString()
  @IsNotEmpty()
  JWT_REFRESH_SECRET!: string;

  @IsString()
  @IsOptional()
  JWT_REFRESH_EXPIRES?: string = '1d';

  @IsString()
  COOKIE_DOMAIN: string = 'localhost';

  // Chỉ 'true' (không phân biệt hoa thường) mới bật, xem parseBooleanFlag()
  @IsBoolean()
  COOKIE_SECURE: boolean = false;

  @IsString()
  @IsNotEmpty()
  MEDIA_ROOT: string = './media';

  // MEDIA_URL phải bắt đầu và kết thúc bằng "/" (VD: /media/)
  @Matches(/^\/(.+\/)?$/, { message: 'MEDIA_URL must start and end with /' })
  MEDIA_URL: string = '/media/';
}

// enableImplicitConversion biến mọi chuỗi khác rỗng thành true ('false' cũng vậy)
// nên flag boolean phải được parse trước khi đưa vào plainToInstance
function parseBooleanFlag(config: Record<string, unknown>, key: string) {
  const raw = config[key];
  if (typeof raw === 'string') {
    config[key] = raw.toLowerCase() === 'true';
  }
}

// Hàm validate được ConfigModule gọi khi app khởi động
export function validate(config: Record<string, unknown>) {
  const input = { ...config };
  parseBooleanFlag(input, 'COOKIE_SECURE');

  const validated = plainToInstance(EnvironmentVariables, input, {
    // Tự động convert kiểu (VD: '3000' -> 3000)
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, {
    skipMissingProperties: false,
  });

  // Nếu có lỗi, gom message lại thành 1 chuỗi và ném ra Error
  if (errors.length > 0) {
    throw new Error(
      `Config validation error: ${errors
        .map((error) => Object.values(error.constraints ?? {}).join(', '))
        .join('; ')}`,
    );
  }

  return validated;
}
