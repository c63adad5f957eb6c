import {
  Injectable,
  UnauthorizedException,
  ConflictException,
  Logger,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { User, UserDocument } from '../models/user.schema';
import { RegisterDto } from '../dto/register.dto';
import { LoginDto } from '../dto/login.dto';
import { BalanceService } from '../services/balance/balance.service';

export interface AccountView {
  id: string;
  username: string;
  email?: string;
  balance: number;
  acceptsPayments: boolean;
}

export interface AuthResult {
  access_token: string;
  user: AccountView;
}

/**
 * AuthService
 *
 * Handles authentication operations:
 * - Account registration with password hashing
 * - Login with password verification
 * - JWT token generation
 * - Account lookup for JWT strategy
 *
 * The JWT subject (account id) is the caller identity of every
 * marketplace operation.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly saltRounds = 10;

  constructor(
    @InjectModel(User.name) private userModel: Model<User>,
    private jwtService: JwtService,
    private configService: ConfigService,
    private balanceService: BalanceService,
  ) {}

  /**
   * Register a new account
   *
   * @throws ConflictException if username already exists
   */
  async register(dto: RegisterDto): Promise<AuthResult> {
    const existingUser = await this.userModel
      .findOne({ username: dto.username })
      .exec();

    if (existingUser) {
      throw new ConflictException('Username already exists');
    }

    const hashedPassword = await this.hashPassword(dto.password);

    let user = await this.userModel.create({
      username: dto.username,
      password: hashedPassword,
      email: dto.email,
      balance: 0,
      acceptsPayments: true,
    });

    // стартовый баланс через BalanceService, чтобы была запись в ledger
    if (dto.initialBalance && dto.initialBalance > 0) {
      user = await this.balanceService.deposit(
        user._id.toString(),
        dto.initialBalance,
        `Initial balance deposit for user ${dto.username}`,
      );
    }

    const token = await this.generateToken(user._id.toString(), user.username);

    this.logger.log(`User registered: ${user.username} (${user._id})`);

    return {
      access_token: token,
      user: this.toAccountView(user),
    };
  }

  /**
   * Login
   *
   * @throws UnauthorizedException if credentials are invalid
   */
  async login(dto: LoginDto): Promise<AuthResult> {
    const user = await this.userModel
      .findOne({ username: dto.username })
      .select('+password')
      .exec();

    if (!user) {
      this.logger.warn(`Login attempt with invalid username: ${dto.username}`);
      throw new UnauthorizedException('Invalid credentials');
    }

    if (!user.password) {
      this.logger.warn(`Login attempt for user without password: ${dto.username}`);
      throw new UnauthorizedException('Invalid credentials');
    }

    const isPasswordValid = await this.comparePassword(dto.password, user.password);

    if (!isPasswordValid) {
      this.logger.warn(`Login attempt with invalid password for user: ${dto.username}`);
      throw new UnauthorizedException('Invalid credentials');
    }

    const token = await this.generateToken(user._id.toString(), user.username);

    this.logger.log(`User logged in: ${user.username} (${user._id})`);

    return {
      access_token: token,
      user: this.toAccountView(user),
    };
  }

  /**
   * Called by JwtStrategy to resolve the token subject
   *
   * @throws UnauthorizedException if the account no longer exists
   */
  async validateUser(userId: string): Promise<UserDocument> {
    const user = await this.userModel.findById(userId).exec();

    if (!user) {
      throw new UnauthorizedException('User not found');
    }

    return user;
  }

  /**
   * Toggle whether direct transfers to this account are accepted
   * With false, refunds and sale proceeds land in the credit ledger
   */
  async setAcceptsPayments(userId: string, acceptsPayments: boolean): Promise<AccountView> {
    const user = await this.userModel
      .findByIdAndUpdate(userId, { $set: { acceptsPayments } }, { new: true })
      .exec();

    if (!user) {
      throw new UnauthorizedException('User not found');
    }

    this.logger.log(`User ${userId} acceptsPayments=${acceptsPayments}`);
    return this.toAccountView(user);
  }

  toAccountView(user: UserDocument): AccountView {
    return {
      id: user._id.toString(),
      username: user.username,
      email: user.email,
      balance: user.balance,
      acceptsPayments: user.acceptsPayments,
    };
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.saltRounds);
  }

  async comparePassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }

  private async generateToken(userId: string, username: string): Promise<string> {
    const payload = {
      sub: userId,
      username: username,
    };

    const expiresIn = this.configService.get<string>('jwt.expiresIn', '24h');

    return this.jwtService.signAsync(payload, { expiresIn });
  }
}
