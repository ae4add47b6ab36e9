export * from './Payload';
export * from './Envelope';
export * from './SerializerRegistry';
