import { Module } from '@nestjs/common';
import { InMemoryUsersRepository } from './in-memory-users.repository';
import { UsersController } from './users.controller';
import { UsersRepository } from './users.repository';
import { UsersSeeder } from './users.seeder';
import { UsersService } from './users.service';

@Module({
  controllers: [UsersController],
  providers: [
    { provide: UsersRepository, useClass: InMemoryUsersRepository },
    UsersService,
    UsersSeeder,
  ],
  exports: [UsersRepository, UsersService],
})
export class UsersModule {}
