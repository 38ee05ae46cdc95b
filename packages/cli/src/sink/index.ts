export * from './types';
export * from './stdout';
export * from './clipboard';
