export * from './configuration';
export * from './config.module';
export { default } from './configuration';
