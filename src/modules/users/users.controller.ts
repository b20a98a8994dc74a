import {
  Controller,
  Get,
  Patch,
  Delete,
  Body,
  Param,
  ParseUUIDPipe,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiParam,
  ApiBody,
} from '@nestjs/swagger';
import { UsersService } from './users.service';
import { User, toPublicUser } from './entities/user.entity';
import { UserRole } from './enums/user-role.enum';
import { UpdateRoleDto } from './dto/update-role.dto';
import { Auth } from '../auth/decorators/auth.decorator';
import { ActiveUser } from '../auth/decorators/active-user.decorator';

@ApiTags('Users')
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('me')
  @Auth()
  @ApiOperation({ summary: 'Account behind the access token' })
  @ApiResponse({ status: 200, description: 'Current account' })
  whoAmI(@ActiveUser() user: User) {
    return toPublicUser(user);
  }

  @Delete('me')
  @Auth()
  @ApiOperation({ summary: 'Delete the current account and all of its todos' })
  @ApiResponse({ status: 200, description: 'Account deleted' })
  async deleteMe(@ActiveUser() user: User) {
    // Outstanding tokens stop resolving once the account row is gone
    await this.usersService.remove(user);
    return { message: 'User deleted' };
  }

  @Get()
  @Auth(UserRole.ADMIN)
  @ApiOperation({ summary: 'List every account (admin only)' })
  @ApiResponse({ status: 200, description: 'Accounts, newest first' })
  @ApiResponse({ status: 403, description: 'Admins only' })
  async findAll() {
    const users = await this.usersService.findAll();
    return users.map(toPublicUser);
  }

  @Patch(':uid/role')
  @Auth(UserRole.ADMIN)
  @ApiOperation({ summary: 'Change the role of an account (admin only)' })
  @ApiParam({ name: 'uid', description: 'Account UID' })
  @ApiBody({ type: UpdateRoleDto })
  @ApiResponse({ status: 200, description: 'Role updated' })
  @ApiResponse({ status: 403, description: 'Admins only' })
  @ApiResponse({ status: 404, description: 'Account not found' })
  async updateRole(
    @Param('uid', ParseUUIDPipe) uid: string,
    @Body() updateRoleDto: UpdateRoleDto,
  ) {
    return toPublicUser(await this.usersService.updateRole(uid, updateRoleDto.role));
  }
}
