export * from './catalog';
export * from './constraints';
export * from './journeys';
export * from './logger';
export * from './normalize';
export * from './report';
export * from './schedule';
export * from './travel';
export * from './utils';
export * from './validate';
