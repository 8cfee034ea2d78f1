export { MockTransport } from './transport';
