// Export planner types
export * from './planner';
