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
import { AccountRole } from '../common/enums/account-role.enum';

export interface AccountView {
  id: string;
  username: string;
  email?: string;
  role: AccountRole;
  balance: number;
  lockedBalance: number;
}

export interface AuthResult {
  access_token: string;
  user: AccountView;
}

export interface JwtPayload {
  sub: string;
  username: string;
  role: AccountRole;
}

export function toAccountView(user: UserDocument): AccountView {
  return {
    id: user._id.toString(),
    username: user.username,
    email: user.email,
    role: user.role,
    balance: user.balance,
    lockedBalance: user.lockedBalance,
  };
}

/**
 * AuthService
 *
 * Handles authentication operations:
 * - Account registration with password hashing (operator role by config)
 * - Login with password verification
 * - JWT token generation
 * - Account lookup for JWT strategy
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly saltRounds = 10;
  private readonly operatorUsernames: ReadonlySet<string>;

  constructor(
    @InjectModel(User.name) private userModel: Model<UserDocument>,
    private jwtService: JwtService,
    private configService: ConfigService,
  ) {
    this.operatorUsernames = new Set(
      this.configService.get<string[]>('auth.operatorUsernames', []),
    );
  }

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
    const role = this.operatorUsernames.has(dto.username)
      ? AccountRole.OPERATOR
      : AccountRole.USER;

    const user = await this.userModel.create({
      username: dto.username,
      password: hashedPassword,
      email: dto.email,
      role,
      balance: 0,
      lockedBalance: 0,
    });

    const token = await this.generateToken(user);

    this.logger.log(`User registered: ${user.username} (${user._id.toString()}) as ${role}`);

    return { access_token: token, user: toAccountView(user) };
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

    const token = await this.generateToken(user);

    this.logger.log(`User logged in: ${user.username} (${user._id.toString()})`);

    return { access_token: token, user: toAccountView(user) };
  }

  /**
   * Called by JwtStrategy after the token signature is verified
   *
   * @throws UnauthorizedException if user not found
   */
  async validateUser(userId: string): Promise<UserDocument> {
    const user = await this.userModel.findById(userId).exec();

    if (!user) {
      throw new UnauthorizedException('User not found');
    }

    return user;
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.saltRounds);
  }

  async comparePassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }

  private async generateToken(user: UserDocument): Promise<string> {
    const payload: JwtPayload = {
      sub: user._id.toString(),
      username: user.username,
      role: user.role,
    };

    const expiresIn = this.configService.get<string>('jwt.expiresIn', '24h');

    return this.jwtService.signAsync(payload, { expiresIn });
  }
}
