// TypeORM 装饰器依赖的元数据
import 'reflect-metadata';

process.env.NODE_ENV = 'test';
