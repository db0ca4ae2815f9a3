export { createMockTmf921App } from './app';
export { loadMockConfig, parseMockConfig, type MockConfig, type MockConfigInput } from './config';
export {
  MOCK_LIFECYCLE_STATUSES,
  MockIntentRegistry,
  type MockFault,
  type MockIntentEntity,
  type MockLifecycleStatus,
} from './registry';
