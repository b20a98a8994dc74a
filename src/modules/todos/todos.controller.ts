import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiParam,
  ApiBody,
} from '@nestjs/swagger';
import { TodosService } from './todos.service';
import { CreateTodoDto } from './dto/create-todo.dto';
import { UpdateTodoDto } from './dto/update-todo.dto';
import { FilterTodosDto } from './dto/filter-todos.dto';
import { Auth } from '../auth/decorators/auth.decorator';
import { ActiveUser } from '../auth/decorators/active-user.decorator';
import { User } from '../users/entities/user.entity';

@ApiTags('Todos')
@Controller('todos')
@Auth()
export class TodosController {
  constructor(private readonly todosService: TodosService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a todo' })
  @ApiBody({ type: CreateTodoDto })
  @ApiResponse({ status: 201, description: 'Todo created' })
  create(@ActiveUser() user: User, @Body() createTodoDto: CreateTodoDto) {
    return this.todosService.create(user.uid, createTodoDto);
  }

  @Get()
  @ApiOperation({ summary: 'List your todos, optionally by exact title' })
  @ApiResponse({ status: 200, description: 'Todos, oldest first' })
  findAll(@ActiveUser() user: User, @Query() filter: FilterTodosDto) {
    return this.todosService.findAll(user.uid, filter.title);
  }

  @Get(':uid')
  @ApiOperation({ summary: 'Get one of your todos' })
  @ApiParam({ name: 'uid', description: 'Todo UID' })
  @ApiResponse({ status: 200, description: 'Todo found' })
  @ApiResponse({ status: 404, description: 'Todo not found' })
  findOne(@ActiveUser() user: User, @Param('uid', ParseUUIDPipe) uid: string) {
    return this.todosService.findOne(user.uid, uid);
  }

  @Patch(':uid')
  @ApiOperation({ summary: 'Update one of your todos' })
  @ApiParam({ name: 'uid', description: 'Todo UID' })
  @ApiBody({ type: UpdateTodoDto })
  @ApiResponse({ status: 200, description: 'Todo updated' })
  @ApiResponse({ status: 404, description: 'Todo not found' })
  update(
    @ActiveUser() user: User,
    @Param('uid', ParseUUIDPipe) uid: string,
    @Body() updateTodoDto: UpdateTodoDto,
  ) {
    return this.todosService.update(user.uid, uid, updateTodoDto);
  }

  @Delete(':uid')
  @ApiOperation({ summary: 'Delete one of your todos' })
  @ApiParam({ name: 'uid', description: 'Todo UID' })
  @ApiResponse({ status: 200, description: 'Todo deleted' })
  @ApiResponse({ status: 404, description: 'Todo not found' })
  async remove(@ActiveUser() user: User, @Param('uid', ParseUUIDPipe) uid: string) {
    await this.todosService.remove(user.uid, uid);
    return { message: 'Todo deleted' };
  }
}
