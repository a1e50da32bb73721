export type {
  PreparedCall,
  RegisteredTool,
  ToolDefinition,
  ToolExecutionContext,
} from './tool-registry.js';
export { ToolRegistrationError, ToolRegistry } from './tool-registry.js';
export type { InvokeOptions, ToolInvokerOptions } from './tool-invoker.js';
export { ToolConcurrencyError, ToolInvoker } from './tool-invoker.js';
export * from './implementations/index.js';
