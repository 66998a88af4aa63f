/**
 * Auth Service
 * Registration and password login, both answering with a session token
 */

import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Clock } from '@cloudmedia/common/clock';
import { PasswordService } from '@cloudmedia/common/crypto';
import { ERRORS } from '@cloudmedia/common/errors';
import { JwtService } from '@cloudmedia/common/jwt';
import { UserRecord } from '../metadata/records';
import { UsersRepository } from '../metadata/users.repository';
import { AuthResponse, toUserResponse } from './dto/auth-response.dto';
import { LoginDto, RegisterDto } from './dto/register.dto';

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private usersRepository: UsersRepository,
    private passwordService: PasswordService,
    private jwtService: JwtService,
    private clock: Clock,
  ) {}

  async register(dto: RegisterDto): Promise<AuthResponse> {
    const email = normalizeEmail(dto.email);
    this.logger.log(`Registration attempt for ${email}`);

    const user: UserRecord = {
      id: uuidv4(),
      username: dto.username,
      email,
      passwordHash: await this.passwordService.hash(dto.password),
      createdAt: this.clock.now(),
    };

    const result = await this.usersRepository.create(user);
    if (result.kind === 'already_exists') {
      this.logger.warn(`Registration failed: email already exists ${email}`);
      throw ERRORS.UserAlreadyExists(email);
    }

    this.logger.log(`User created: ${result.value.id}`);
    return this.respond(result.value);
  }

  async login(dto: LoginDto): Promise<AuthResponse> {
    const email = normalizeEmail(dto.email);

    const result = await this.usersRepository.findByEmail(email);
    if (result.kind === 'not_found') {
      this.logger.warn(`Login failed: no user for ${email}`);
      throw ERRORS.InvalidCredentials();
    }

    const valid = await this.passwordService.verify(result.value.passwordHash, dto.password);
    if (!valid) {
      this.logger.warn(`Login failed: wrong password for ${email}`);
      throw ERRORS.InvalidCredentials();
    }

    this.logger.log(`Login successful for user ${result.value.id}`);
    return this.respond(result.value);
  }

  private respond(user: UserRecord): AuthResponse {
    return {
      token: this.jwtService.issueToken({ subjectId: user.id, email: user.email }),
      user: toUserResponse(user),
    };
  }
}
