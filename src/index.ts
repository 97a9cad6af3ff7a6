export * from './checksum';
export * from './common';
export * from './region';
export * from './identity';
export * from './fake';
export { AppModule } from './app.module';
export { envValidationSchema } from './config/env.validation';
