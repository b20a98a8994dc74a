import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { DataSource } from 'typeorm';
import { postgresOptions } from './database.config';

dotenv.config();

// Loaded by the TypeORM CLI and the seed script
const AppDataSource = new DataSource({ ...postgresOptions(), synchronize: false });

export default AppDataSource;
