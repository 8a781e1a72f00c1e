import { expect } from 'chai';

export function expectPromise(promise: unknown) {
  expect(promise).to.be.instanceOf(Promise);

  return {
    async toResolve(): Promise<unknown> {
      return promise;
    },
    async toRejectWith(message: string) {
      let caughtError: unknown;

      try {
        await promise;
        expect.fail('promise should have thrown but did not');
      } catch (error) {
        caughtError = error;
      }

      expect(caughtError).to.be.an.instanceOf(Error);
      expect(caughtError).to.have.property('message', message);
    },
  };
}
