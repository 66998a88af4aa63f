export * from './jwt.types';
export * from './jwt.service';
export * from './jwt.module';
