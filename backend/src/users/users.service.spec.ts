import { ConflictException } from '@nestjs/common';
import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import * as bcrypt from 'bcrypt';
import { Types } from 'mongoose';
import { UsersService } from './users.service';
import { User } from './schemas/user.schema';

// Model fake: findOne() tìm theo email trong danh sách, save() lưu vào savedUsers
const registeredEmails = new Set<string>();
const savedUsers: Array<Record<string, unknown>> = [];
let saveError: unknown = null;
const NEW_USER_ID = new Types.ObjectId();

class FakeUserModel {
  static findOne = jest.fn((filter: { email: string }) => {
    const found = registeredEmails.has(filter.email) ? { _id: new Types.ObjectId() } : null;
    const query = { select: () => query, exec: async () => found };
    return query;
  });

  constructor(private readonly doc: Record<string, unknown>) {}

  async save() {
    if (saveError) {
      throw saveError;
    }
    savedUsers.push(this.doc);
    return { _id: NEW_USER_ID, firstName: '', lastName: '', ...this.doc };
  }
}

describe('UsersService.create', () => {
  let service: UsersService;

  beforeEach(async () => {
    registeredEmails.clear();
    savedUsers.length = 0;
    saveError = null;

    const moduleRef = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: getModelToken(User.name), useValue: FakeUserModel },
      ],
    }).compile();

    service = moduleRef.get(UsersService);
  });

  it('registers a non-staff user with a hashed password', async () => {
    const result = await service.create({
      email: 'new@test.com',
      password: 'pass12345',
      firstName: 'Ann',
    });

    expect(result).toEqual({
      id: NEW_USER_ID.toString(),
      email: 'new@test.com',
      firstName: 'Ann',
      lastName: '',
      isStaff: false,
    });
    expect(result).not.toHaveProperty('password');

    const [stored] = savedUsers;
    expect(stored.isStaff).toBe(false);
    expect(stored.password).not.toBe('pass12345');
    await expect(bcrypt.compare('pass12345', String(stored.password))).resolves.toBe(true);
  });

  it('answers 409 for an email that is already registered', async () => {
    registeredEmails.add('taken@test.com');

    await expect(
      service.create({ email: 'Taken@test.com', password: 'pass12345' }),
    ).rejects.toThrow(new ConflictException('User with this email already exists'));
    expect(savedUsers).toHaveLength(0);
  });

  it('answers 409 when the unique index catches a concurrent registration', async () => {
    saveError = { code: 11000, message: 'E11000 duplicate key error' };

    await expect(
      service.create({ email: 'race@test.com', password: 'pass12345' }),
    ).rejects.toThrow(new ConflictException('User with this email already exists'));
  });
});
