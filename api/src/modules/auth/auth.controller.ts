import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AuthSession, Principal } from '../../shared/auth/auth.types';
import { CurrentPrincipal } from '../../shared/decorators/current-principal.decorator';
import { Public } from '../../shared/decorators/public.decorator';
import { ZodValidationPipe } from '../../shared/validation/zod-validation.pipe';
import {
  LoginInput,
  RefreshInput,
  RegisterInput,
  loginSchema,
  refreshSchema,
  registerSchema
} from './auth.schemas';
import { AuthService, CurrentUserView } from './auth.service';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Public()
  @Post('register')
  register(@Body(new ZodValidationPipe(registerSchema)) body: RegisterInput): Promise<AuthSession> {
    return this.authService.register(body);
  }

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(@Body(new ZodValidationPipe(loginSchema)) body: LoginInput): Promise<AuthSession> {
    return this.authService.login(body);
  }

  @Public()
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  refresh(@Body(new ZodValidationPipe(refreshSchema)) body: RefreshInput): Promise<AuthSession> {
    return this.authService.refresh(body.refreshToken);
  }

  @Get('me')
  me(@CurrentPrincipal() principal: Principal): Promise<CurrentUserView> {
    return this.authService.me(principal);
  }
}
