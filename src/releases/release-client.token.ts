export const RELEASE_CLIENT = Symbol('RELEASE_CLIENT');
