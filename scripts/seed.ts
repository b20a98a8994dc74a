import * as dotenv from 'dotenv';
import * as bcrypt from 'bcrypt';
import AppDataSource from '../src/config/typeorm.datasource';
import { User } from '../src/modules/users/entities/user.entity';
import { UserRole } from '../src/modules/users/enums/user-role.enum';
import {
  passwordPolicyViolation,
  usernamePolicyViolation,
} from '../src/modules/auth/policies/credential-policy';

dotenv.config();

/**
 * Seeds an admin account.
 *
 * Usage: npm run db:seed -- <username> <email> <password>
 */
async function seed() {
  const [username, email, password] = process.argv.slice(2);
  if (!username || !email || !password) {
    console.error('Usage: npm run db:seed -- <username> <email> <password>');
    process.exitCode = 1;
    return;
  }

  const violation = usernamePolicyViolation(username) ?? passwordPolicyViolation(password);
  if (violation) {
    console.error(violation);
    process.exitCode = 1;
    return;
  }

  try {
    console.log('Connecting to database...');
    await AppDataSource.initialize();

    const userRepo = AppDataSource.getRepository(User);
    const exists = await userRepo.findOne({ where: [{ username }, { email }] });

    if (exists) {
      console.log(`User ${exists.username} already exists.`);
    } else {
      const rounds = Number(process.env.BCRYPT_ROUNDS || 10);
      await userRepo.save(
        userRepo.create({
          username,
          email,
          passwordHash: await bcrypt.hash(password, rounds),
          role: UserRole.ADMIN,
          isVerified: true,
        }),
      );
      console.log(`Created admin: ${username}`);
    }
  } catch (error) {
    console.error('Error seeding database:', error);
    process.exitCode = 1;
  } finally {
    if (AppDataSource.isInitialized) {
      await AppDataSource.destroy();
    }
  }
}

void seed();
