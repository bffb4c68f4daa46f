import {
  Controller,
  Post,
  Get,
  Body,
  HttpCode,
  HttpStatus,
  UseGuards,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth } from '@nestjs/swagger';
import { AuthService, toAccountView } from './auth.service';
import { RegisterDto } from '../dto/register.dto';
import { LoginDto } from '../dto/login.dto';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { CurrentUser } from './decorators/current-user.decorator';
import { UserDocument } from '../models/user.schema';

const authResultSchema = {
  type: 'object',
  properties: {
    access_token: { type: 'string' },
    user: {
      type: 'object',
      properties: {
        id: { type: 'string' },
        username: { type: 'string' },
        email: { type: 'string', nullable: true },
        role: { type: 'string', enum: ['USER', 'OPERATOR'] },
        balance: { type: 'number' },
        lockedBalance: { type: 'number' },
      },
    },
  },
};

/**
 * AuthController
 *
 * - POST /auth/register - Register new account
 * - POST /auth/login - Login
 * - GET /auth/me - Current account (protected)
 */
@ApiTags('Auth')
@Controller('auth')
export class AuthController {
  constructor(private authService: AuthService) {}

  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Register a new account',
    description: 'Creates an account with username and password. Returns JWT token.',
  })
  @ApiResponse({ status: 201, description: 'Account registered', schema: authResultSchema })
  @ApiResponse({ status: 409, description: 'Username already exists' })
  async register(@Body() dto: RegisterDto) {
    return this.authService.register(dto);
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Login', description: 'Returns JWT token.' })
  @ApiResponse({ status: 200, description: 'Login successful', schema: authResultSchema })
  @ApiResponse({ status: 401, description: 'Invalid credentials' })
  async login(@Body() dto: LoginDto) {
    return this.authService.login(dto);
  }

  @Get('me')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Get current account' })
  @ApiResponse({ status: 401, description: 'Unauthorized' })
  async getMe(@CurrentUser() user: UserDocument) {
    return { ...toAccountView(user), createdAt: user.createdAt };
  }
}
