import * as chai from 'chai';
import sinonChai from 'sinon-chai';
import * as Factory from 'factory.ts';

chai.use(sinonChai);

export const expect = chai.expect;

export const MockFactory = Factory.Sync;
export { each } from 'factory.ts';
