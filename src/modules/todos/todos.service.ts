import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { Todo } from './entities/todo.entity';
import { CreateTodoDto } from './dto/create-todo.dto';
import { UpdateTodoDto } from './dto/update-todo.dto';

/** Every query is scoped to the owner; another user's todo reads as missing. */
@Injectable()
export class TodosService {
  constructor(
    @InjectRepository(Todo)
    private todoRepository: Repository<Todo>,
  ) {}

  async create(ownerId: string, createTodoDto: CreateTodoDto): Promise<Todo> {
    const todo = this.todoRepository.create({
      title: createTodoDto.title,
      description: createTodoDto.description ?? null,
      completed: createTodoDto.completed ?? false,
      ownerId,
    });
    return this.todoRepository.save(todo);
  }

  findAll(ownerId: string, title?: string): Promise<Todo[]> {
    const where: FindOptionsWhere<Todo> = { ownerId };
    if (title !== undefined) {
      where.title = title;
    }
    return this.todoRepository.find({
      where,
      order: { createdAt: 'ASC' },
    });
  }

  async findOne(ownerId: string, uid: string): Promise<Todo> {
    const todo = await this.todoRepository.findOne({ where: { uid, ownerId } });
    if (!todo) {
      throw new NotFoundException('Todo not found');
    }
    return todo;
  }

  async update(ownerId: string, uid: string, updateTodoDto: UpdateTodoDto): Promise<Todo> {
    const todo = await this.findOne(ownerId, uid);

    if (updateTodoDto.title !== undefined) {
      todo.title = updateTodoDto.title;
    }
    if (updateTodoDto.description !== undefined) {
      todo.description = updateTodoDto.description;
    }
    if (updateTodoDto.completed !== undefined) {
      todo.completed = updateTodoDto.completed;
    }

    return this.todoRepository.save(todo);
  }

  async remove(ownerId: string, uid: string): Promise<void> {
    const todo = await this.findOne(ownerId, uid);
    await this.todoRepository.remove(todo);
  }
}
