import {
  Injectable,
  Logger,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { User } from './entities/user.entity';
import { UserRole } from './enums/user-role.enum';

const PG_UNIQUE_VIOLATION = '23505';

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  role?: UserRole;
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  findByUid(uid: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { uid } });
  }

  findByUsername(username: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { username } });
  }

  findByEmail(email: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { email } });
  }

  findAll(): Promise<User[]> {
    return this.userRepository.find({ order: { createdAt: 'DESC' } });
  }

  async create(newUser: NewUser): Promise<User> {
    const user = this.userRepository.create({
      username: newUser.username,
      email: newUser.email,
      passwordHash: newUser.passwordHash,
      role: newUser.role ?? UserRole.USER,
      isVerified: false,
    });

    try {
      return await this.userRepository.save(user);
    } catch (error) {
      // A concurrent registration can pass the lookups and lose the race on the index
      if (isUniqueViolation(error)) {
        this.logger.warn(
          `Unique constraint hit while creating user ${newUser.username}`,
        );
        throw new ConflictException('Username or email already registered');
      }
      throw error;
    }
  }

  async markVerified(user: User): Promise<User> {
    if (user.isVerified) {
      return user;
    }
    user.isVerified = true;
    return this.userRepository.save(user);
  }

  async updatePasswordHash(user: User, passwordHash: string): Promise<User> {
    user.passwordHash = passwordHash;
    return this.userRepository.save(user);
  }

  async updateRole(uid: string, role: UserRole): Promise<User> {
    const user = await this.findByUid(uid);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    user.role = role;
    return this.userRepository.save(user);
  }

  async remove(user: User): Promise<void> {
    await this.userRepository.remove(user);
    this.logger.log(`User ${user.username} deleted`);
  }
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}
