export { marshal, marshalOne } from './marshal.js';
export type { MarshalledRecord, MarshalOutput } from './marshal.js';
