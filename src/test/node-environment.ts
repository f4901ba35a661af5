import NodeEnvironment from 'jest-environment-node';

// The in-memory fakes copy rows with structuredClone, which jest's node
// environment takes from the host realm. Share the host Date so cloned
// dates stay instances of the Date the tests see.
export default class NodeEnvironmentWithHostDate extends NodeEnvironment {
  async setup(): Promise<void> {
    await super.setup();
    this.global.Date = Date;
  }
}
