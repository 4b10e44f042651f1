// public api for @agentchain/sdk
// usage:
//   import { WorkflowClient, buildSimpleChain } from '@agentchain/sdk';
//   const summary = await client.executeWorkflow(buildSimpleChain({ ... }), { ownerId });

export * from './types';
export * from './errors';
export * from './graph';
export * from './definition';
export * from './templates';
export * from './proto';
export * from './wire';
export * from './grpc-client';
export * from './utils/serialization';
