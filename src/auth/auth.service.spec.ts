import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken } from '@nestjs/mongoose';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { UnauthorizedException, ConflictException } from '@nestjs/common';
import { Types } from 'mongoose';
import * as bcrypt from 'bcrypt';
import { AuthService } from './auth.service';
import { BalanceService } from '../services/balance/balance.service';
import { User } from '../models/user.schema';

describe('AuthService', () => {
  let service: AuthService;
  let userModel: any;
  let jwtService: any;
  let balanceService: any;

  const accountId = new Types.ObjectId('65a1b2c3d4e5f6a7b8c9d0e1');

  const account = (overrides: Record<string, unknown> = {}) => ({
    _id: accountId,
    username: 'alice',
    email: 'alice@example.com',
    balance: 0,
    acceptsPayments: true,
    ...overrides,
  });

  const lookupReturns = (user: unknown) =>
    userModel.findOne.mockReturnValue({
      exec: jest.fn().mockResolvedValue(user),
      select: jest.fn().mockReturnValue({
        exec: jest.fn().mockResolvedValue(user),
      }),
    });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        {
          provide: getModelToken(User.name),
          useValue: {
            findOne: jest.fn(),
            create: jest.fn(),
            findById: jest.fn(),
            findByIdAndUpdate: jest.fn(),
          },
        },
        {
          provide: JwtService,
          useValue: {
            signAsync: jest.fn().mockResolvedValue('signed-token'),
          },
        },
        {
          provide: ConfigService,
          useValue: new ConfigService({ jwt: { secret: 'test-secret', expiresIn: '1h' } }),
        },
        {
          provide: BalanceService,
          useValue: {
            deposit: jest.fn(),
          },
        },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
    userModel = module.get(getModelToken(User.name));
    jwtService = module.get(JwtService);
    balanceService = module.get(BalanceService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('register', () => {
    beforeEach(() => {
      lookupReturns(null);
      userModel.create.mockImplementation(async (fields: Record<string, unknown>) =>
        account(fields),
      );
    });

    it('should open an empty account that accepts payments', async () => {
      const result = await service.register({ username: 'alice', password: 'test-password' });

      const stored = userModel.create.mock.calls[0][0];
      expect(stored).toMatchObject({ username: 'alice', balance: 0, acceptsPayments: true });
      expect(stored.password).not.toBe('test-password');
      await expect(bcrypt.compare('test-password', stored.password)).resolves.toBe(true);

      expect(balanceService.deposit).not.toHaveBeenCalled();
      expect(result.user).toEqual({
        id: accountId.toString(),
        username: 'alice',
        email: undefined,
        balance: 0,
        acceptsPayments: true,
      });
    });

    it('should fund the initial balance through BalanceService', async () => {
      balanceService.deposit.mockResolvedValue(account({ balance: 2500 }));

      const result = await service.register({
        username: 'alice',
        password: 'test-password',
        initialBalance: 2500,
      });

      expect(balanceService.deposit).toHaveBeenCalledWith(
        accountId.toString(),
        2500,
        'Initial balance deposit for user alice',
      );
      expect(result.user.balance).toBe(2500);
    });

    it('should issue a token whose subject is the account id', async () => {
      const result = await service.register({ username: 'alice', password: 'test-password' });

      expect(jwtService.signAsync).toHaveBeenCalledWith(
        { sub: accountId.toString(), username: 'alice' },
        { expiresIn: '1h' },
      );
      expect(result.access_token).toBe('signed-token');
    });

    it('should refuse a taken username without creating an account', async () => {
      lookupReturns(account());

      await expect(
        service.register({ username: 'alice', password: 'test-password' }),
      ).rejects.toThrow(new ConflictException('Username already exists'));
      expect(userModel.create).not.toHaveBeenCalled();
    });
  });

  describe('login', () => {
    let passwordHash: string;

    beforeAll(async () => {
      passwordHash = await bcrypt.hash('test-password', 4);
    });

    it('should return the account with its payment setting', async () => {
      lookupReturns(account({ password: passwordHash, balance: 750, acceptsPayments: false }));

      const result = await service.login({ username: 'alice', password: 'test-password' });

      expect(result).toEqual({
        access_token: 'signed-token',
        user: {
          id: accountId.toString(),
          username: 'alice',
          email: 'alice@example.com',
          balance: 750,
          acceptsPayments: false,
        },
      });
    });

    it.each([
      ['an unknown username', () => null],
      ['an account without a password', () => account()],
      ['a wrong password', () => account({ password: passwordHash })],
    ])('should answer Invalid credentials for %s', async (_case, user) => {
      lookupReturns(user());

      await expect(
        service.login({ username: 'alice', password: 'wrong-password' }),
      ).rejects.toThrow(new UnauthorizedException('Invalid credentials'));
      expect(jwtService.signAsync).not.toHaveBeenCalled();
    });
  });

  describe('validateUser', () => {
    it('should resolve the token subject to the calling account', async () => {
      const user = account();
      userModel.findById.mockReturnValue({ exec: jest.fn().mockResolvedValue(user) });

      const caller = await service.validateUser(accountId.toString());

      expect(caller._id.toString()).toBe(accountId.toString());
      expect(userModel.findById).toHaveBeenCalledWith(accountId.toString());
    });

    it('should reject a subject whose account is gone', async () => {
      userModel.findById.mockReturnValue({ exec: jest.fn().mockResolvedValue(null) });

      await expect(service.validateUser(accountId.toString())).rejects.toThrow(
        new UnauthorizedException('User not found'),
      );
    });
  });

  describe('setAcceptsPayments', () => {
    it('should store the flag and return the updated account', async () => {
      userModel.findByIdAndUpdate.mockReturnValue({
        exec: jest.fn().mockResolvedValue(account({ acceptsPayments: false })),
      });

      const view = await service.setAcceptsPayments(accountId.toString(), false);

      expect(userModel.findByIdAndUpdate).toHaveBeenCalledWith(
        accountId.toString(),
        { $set: { acceptsPayments: false } },
        { new: true },
      );
      expect(view.acceptsPayments).toBe(false);
    });

    it('should reject an unknown account', async () => {
      userModel.findByIdAndUpdate.mockReturnValue({
        exec: jest.fn().mockResolvedValue(null),
      });

      await expect(service.setAcceptsPayments(accountId.toString(), true)).rejects.toThrow(
        UnauthorizedException,
      );
    });
  });
});
