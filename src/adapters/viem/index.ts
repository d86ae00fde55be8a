export { connectViem as connect } from './provider';
export * from './provider';
