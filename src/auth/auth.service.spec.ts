import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken } from '@nestjs/mongoose';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { UnauthorizedException, ConflictException } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { AuthService } from './auth.service';
import { User } from '../models/user.schema';
import { RegisterDto } from '../dto/register.dto';
import { LoginDto } from '../dto/login.dto';
import { AccountRole } from '../common/enums/account-role.enum';

jest.mock('bcrypt', () => ({ hash: jest.fn(), compare: jest.fn() }));

describe('AuthService', () => {
  let service: AuthService;
  let userModel: any;
  let jwtService: any;

  const config: Record<string, unknown> = {
    'jwt.expiresIn': '24h',
    'jwt.secret': 'test-secret',
    'auth.operatorUsernames': ['root'],
  };

  const mockUser = {
    _id: 'user123',
    username: 'testuser',
    email: 'test@example.com',
    password: 'hashed-password',
    role: AccountRole.USER,
    balance: 1000,
    lockedBalance: 0,
  };

  const withExec = (value: unknown) => ({ exec: jest.fn().mockResolvedValue(value) });

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
          },
        },
        {
          provide: JwtService,
          useValue: {
            signAsync: jest.fn().mockResolvedValue('jwt-token-123'),
          },
        },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string, defaultValue?: unknown) =>
              key in config ? config[key] : defaultValue,
            ),
          },
        },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
    userModel = module.get(getModelToken(User.name));
    jwtService = module.get<JwtService>(JwtService);

    (bcrypt.hash as jest.Mock).mockResolvedValue('hashed-password');
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('register', () => {
    const registerDto: RegisterDto = {
      username: 'testuser',
      password: 'password123',
      email: 'test@example.com',
    };

    it('should register a new user with a hashed password', async () => {
      userModel.findOne.mockReturnValue(withExec(null));
      userModel.create.mockResolvedValue(mockUser);

      const result = await service.register(registerDto);

      expect(result).toEqual({
        access_token: 'jwt-token-123',
        user: {
          id: 'user123',
          username: 'testuser',
          email: 'test@example.com',
          role: AccountRole.USER,
          balance: 1000,
          lockedBalance: 0,
        },
      });
      expect(bcrypt.hash).toHaveBeenCalledWith('password123', 10);
      expect(userModel.create).toHaveBeenCalledWith({
        username: 'testuser',
        password: 'hashed-password',
        email: 'test@example.com',
        role: AccountRole.USER,
        balance: 0,
        lockedBalance: 0,
      });
    });

    it('should throw ConflictException if username already exists', async () => {
      userModel.findOne.mockReturnValue(withExec(mockUser));

      await expect(service.register(registerDto)).rejects.toThrow(ConflictException);
      expect(userModel.create).not.toHaveBeenCalled();
    });

    it('should give configured usernames the operator role', async () => {
      userModel.findOne.mockReturnValue(withExec(null));
      userModel.create.mockImplementation(async (data: any) => ({ _id: 'user999', ...data }));

      const result = await service.register({ username: 'root', password: 'password123' });

      expect(result.user.role).toBe(AccountRole.OPERATOR);
      expect(jwtService.signAsync).toHaveBeenCalledWith(
        { sub: 'user999', username: 'root', role: AccountRole.OPERATOR },
        { expiresIn: '24h' },
      );
    });

    it('should register user without email', async () => {
      userModel.findOne.mockReturnValue(withExec(null));
      userModel.create.mockResolvedValue({ ...mockUser, email: undefined });

      const result = await service.register({ username: 'testuser', password: 'password123' });

      expect(result.user.email).toBeUndefined();
    });
  });

  describe('login', () => {
    const loginDto: LoginDto = {
      username: 'testuser',
      password: 'password123',
    };

    const mockFindWithPassword = (user: unknown) => {
      const select = jest.fn().mockReturnValue(withExec(user));
      userModel.findOne.mockReturnValue({ select });
      return select;
    };

    it('should login user with valid credentials', async () => {
      const select = mockFindWithPassword(mockUser);
      (bcrypt.compare as jest.Mock).mockResolvedValue(true);

      const result = await service.login(loginDto);

      expect(result.access_token).toBe('jwt-token-123');
      expect(result.user.id).toBe('user123');
      expect(select).toHaveBeenCalledWith('+password');
      expect(bcrypt.compare).toHaveBeenCalledWith('password123', 'hashed-password');
      expect(jwtService.signAsync).toHaveBeenCalledWith(
        { sub: 'user123', username: 'testuser', role: AccountRole.USER },
        { expiresIn: '24h' },
      );
    });

    it('should throw UnauthorizedException if user not found', async () => {
      mockFindWithPassword(null);

      await expect(service.login(loginDto)).rejects.toThrow('Invalid credentials');
      expect(jwtService.signAsync).not.toHaveBeenCalled();
    });

    it('should throw UnauthorizedException if password is invalid', async () => {
      mockFindWithPassword(mockUser);
      (bcrypt.compare as jest.Mock).mockResolvedValue(false);

      await expect(service.login(loginDto)).rejects.toThrow(UnauthorizedException);
      expect(jwtService.signAsync).not.toHaveBeenCalled();
    });

    it('should throw UnauthorizedException if user has no password', async () => {
      mockFindWithPassword({ ...mockUser, password: undefined });

      await expect(service.login(loginDto)).rejects.toThrow(UnauthorizedException);
      expect(bcrypt.compare).not.toHaveBeenCalled();
    });
  });

  describe('validateUser', () => {
    it('should return user if found', async () => {
      userModel.findById.mockReturnValue(withExec(mockUser));

      const result = await service.validateUser('user123');

      expect(result).toEqual(mockUser);
      expect(userModel.findById).toHaveBeenCalledWith('user123');
    });

    it('should throw UnauthorizedException if user not found', async () => {
      userModel.findById.mockReturnValue(withExec(null));

      await expect(service.validateUser('user123')).rejects.toThrow('User not found');
    });
  });
});
