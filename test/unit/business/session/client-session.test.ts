// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {ClientSession} from '../../../../src/business/session/client-session.js';
import {FakeK8} from '../../../helpers/fake-k8.js';

describe('ClientSession', (): void => {
  it('should start on the default dataplane namespace', (): void => {
    const session: ClientSession = ClientSession.create(new FakeK8(), 100);

    expect(session.dataplaneNamespace).to.equal('octarine-dataplane');
    expect(session.events.capacity).to.equal(100);
  });

  it('should record a dataplane namespace as a new value sharing the connection', (): void => {
    const session: ClientSession = ClientSession.create(new FakeK8(), 100);

    const moved: ClientSession = session.withDataplaneNamespace('mesh-system');

    expect(moved).to.not.equal(session);
    expect(session.dataplaneNamespace).to.equal('octarine-dataplane');
    expect(moved.dataplaneNamespace).to.equal('mesh-system');
    expect(moved.id).to.equal(session.id);
    expect(moved.k8).to.equal(session.k8);
    expect(moved.events).to.equal(session.events);
    expect(moved.tasks).to.equal(session.tasks);
  });

  it('should return itself when the namespace does not change', (): void => {
    const session: ClientSession = ClientSession.create(new FakeK8(), 100);

    expect(session.withDataplaneNamespace('octarine-dataplane')).to.equal(session);
  });

  it('should be frozen', (): void => {
    const session: ClientSession = ClientSession.create(new FakeK8(), 100);

    expect(Object.isFrozen(session)).to.be.true;
  });
});
