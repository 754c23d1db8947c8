export { FakeProvider, type FakeMachineState } from './fake-provider.js'
export { createTempProject, type TempProject } from './project.js'
