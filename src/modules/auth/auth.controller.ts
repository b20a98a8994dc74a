import {
  Controller,
  Post,
  Get,
  Body,
  Param,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiBody,
  ApiResponse,
  ApiParam,
} from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { RegisterDto } from './dto/register.dto';
import { LoginDto } from './dto/login.dto';
import { RefreshTokenDto } from './dto/refresh-token.dto';
import { LogoutDto } from './dto/logout.dto';
import { RequestPasswordResetDto } from './dto/request-password-reset.dto';
import { ResetPasswordDto } from './dto/reset-password.dto';
import { Auth } from './decorators/auth.decorator';
import { ActiveUser } from './decorators/active-user.decorator';
import { BearerToken } from './decorators/bearer-token.decorator';
import { User } from '../users/entities/user.entity';

@ApiTags('Authentication')
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create an account (unverified until the e-mail link is followed)' })
  @ApiBody({ type: RegisterDto })
  @ApiResponse({ status: 201, description: 'Account created' })
  @ApiResponse({ status: 403, description: 'Username or password breaks the credential policy' })
  @ApiResponse({ status: 409, description: 'Username or e-mail already registered' })
  async register(@Body() registerDto: RegisterDto) {
    return this.authService.register(registerDto);
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange username and password for an access and a refresh token' })
  @ApiBody({ type: LoginDto })
  @ApiResponse({
    status: 200,
    description: 'Login succeeded',
    schema: {
      type: 'object',
      properties: {
        access_token: { type: 'string' },
        refresh_token: { type: 'string' },
        token_type: { type: 'string', example: 'bearer' },
      },
    },
  })
  @ApiResponse({ status: 401, description: 'Incorrect username or password' })
  async login(@Body() loginDto: LoginDto) {
    return this.authService.login(loginDto.username, loginDto.password);
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mint a new access token from a refresh token' })
  @ApiBody({ type: RefreshTokenDto })
  @ApiResponse({ status: 200, description: 'New access token issued' })
  @ApiResponse({ status: 401, description: 'Invalid, expired or revoked refresh token' })
  async refresh(@Body() refreshTokenDto: RefreshTokenDto) {
    return this.authService.refresh(refreshTokenDto.refresh_token);
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @Auth()
  @ApiOperation({ summary: 'Revoke the access token (and the refresh token, if sent)' })
  @ApiBody({ type: LogoutDto, required: false })
  @ApiResponse({ status: 200, description: 'Logged out' })
  async logout(@BearerToken() accessToken: string, @Body() logoutDto: LogoutDto) {
    await this.authService.logout(accessToken, logoutDto.refresh_token);
    return { message: 'Logged out successfully' };
  }

  @Post('verify-email')
  @HttpCode(HttpStatus.OK)
  @Auth()
  @ApiOperation({ summary: 'Send the verification link again' })
  @ApiResponse({ status: 200, description: 'Verification mail queued, or account already verified' })
  resendVerification(@ActiveUser() user: User) {
    this.authService.requestEmailVerification(user);
    return { message: 'Verification email sent if the account is not verified yet' };
  }

  @Get('verify-email/:token')
  @ApiOperation({ summary: 'Mark the account behind a verification link as verified' })
  @ApiParam({ name: 'token', description: 'Token from the verification link' })
  @ApiResponse({ status: 200, description: 'E-mail verified' })
  @ApiResponse({ status: 404, description: 'Invalid or expired link' })
  async verifyEmail(@Param('token') token: string) {
    await this.authService.verifyEmail(token);
    return { message: 'Email verified' };
  }

  @Post('password-reset')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send a password reset link' })
  @ApiBody({ type: RequestPasswordResetDto })
  @ApiResponse({ status: 200, description: 'Always returned, whether or not the address is known' })
  async requestPasswordReset(@Body() requestDto: RequestPasswordResetDto) {
    await this.authService.requestPasswordReset(requestDto.email);
    return { message: 'If the address belongs to an account, a reset link has been sent' };
  }

  @Post('password-reset/:token')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Set a new password through a reset link' })
  @ApiParam({ name: 'token', description: 'Token from the reset link' })
  @ApiBody({ type: ResetPasswordDto })
  @ApiResponse({ status: 200, description: 'Password changed' })
  @ApiResponse({ status: 400, description: 'Passwords do not match' })
  @ApiResponse({ status: 403, description: 'Password breaks the credential policy' })
  @ApiResponse({ status: 404, description: 'Invalid or expired link' })
  async resetPassword(@Param('token') token: string, @Body() resetDto: ResetPasswordDto) {
    await this.authService.resetPassword(token, resetDto);
    return { message: 'Password updated' };
  }
}
