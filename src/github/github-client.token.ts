export const GITHUB_CLIENT = Symbol('GITHUB_CLIENT');
