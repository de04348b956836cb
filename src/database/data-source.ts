import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import { buildDataSourceOptions } from './typeorm.config';

config();

export const AppDataSource = new DataSource(
  buildDataSourceOptions((key) => process.env[key]),
);
