export * from './rom/encoding.js';
export * from './rom/byteorder.js';
export * from './rom/stream.js';
export * from './rom/convert.js';
