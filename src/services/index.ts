export { createServiceContainer } from './service-container.js';
export type { ServiceContainer, ServiceContainerOptions } from './service-container.js';
