export * from './project'
