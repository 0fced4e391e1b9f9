// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {MeshVet} from '../../../../src/business/vet/mesh-vet.js';
import {VetFailedError} from '../../../../src/business/vet/vet-failed-error.js';
import {SupportingObjects} from '../../../../src/business/install/supporting-objects.js';
import {ApplyEngine} from '../../../../src/business/manifest/apply-engine.js';
import {ClientSession} from '../../../../src/business/session/client-session.js';
import {ResourceOperation} from '../../../../src/integration/kube/resources/resource-operation.js';
import {InMemoryResources} from '../../../helpers/in-memory-resources.js';
import {FakeK8} from '../../../helpers/fake-k8.js';
import {TEST_SETTINGS} from '../../../helpers/test-settings.js';
import {silentLogger} from '../../../helpers/test-logger.js';
import {rejectionOf} from '../../../helpers/rejection.js';

describe('MeshVet', (): void => {
  let resources: InMemoryResources;
  let supportingObjects: SupportingObjects;
  let vet: MeshVet;
  let session: ClientSession;

  beforeEach((): void => {
    resources = new InMemoryResources();
    supportingObjects = new SupportingObjects(TEST_SETTINGS, silentLogger());
    vet = new MeshVet(supportingObjects, silentLogger());
    session = ClientSession.create(new FakeK8(resources), 10).withDataplaneNamespace('mesh');
  });

  it('should pass when every supporting object is readable', async (): Promise<void> => {
    await supportingObjects.provision(new ApplyEngine(resources, silentLogger()), 'mesh');
    resources.calls.length = 0;

    await vet.run(session, new AbortController().signal);

    expect(resources.verbs()).to.deep.equal([
      'get namespaces/mesh -',
      'get secrets/docker-registry-secret mesh',
      'get configmaps/octarine-control-plane mesh',
    ]);
  });

  it('should list every failed check', async (): Promise<void> => {
    await supportingObjects.provision(new ApplyEngine(resources, silentLogger()), 'mesh');
    resources.failOn(ResourceOperation.GET, 'secrets', true);

    const error: unknown = await rejectionOf(vet.run(session, new AbortController().signal));

    expect(error).to.be.instanceOf(VetFailedError);
    expect(error).to.have.deep.property('failures', [
      "Secret 'docker-registry-secret': failed to get secrets 'docker-registry-secret' in namespace 'mesh'",
    ]);
    expect(error).to.have.property(
      'message',
      "1 check(s) failed: Secret 'docker-registry-secret': failed to get secrets 'docker-registry-secret' in " +
        "namespace 'mesh'",
    );
  });

  it('should report missing objects', async (): Promise<void> => {
    const error: unknown = await rejectionOf(vet.run(session, new AbortController().signal));

    expect(error).to.have.deep.property('failures', [
      "Namespace 'mesh': get namespaces 'mesh' without namespace: not found",
      "Secret 'docker-registry-secret': get secrets 'docker-registry-secret' in namespace 'mesh': not found",
      "ConfigMap 'octarine-control-plane': get configmaps 'octarine-control-plane' in namespace 'mesh': not found",
    ]);
  });

  it('should stop once cancelled', async (): Promise<void> => {
    const controller: AbortController = new AbortController();
    controller.abort(new Error('stop'));

    const error: unknown = await rejectionOf(vet.run(session, controller.signal));

    expect(error).to.have.property('message', 'stop');
    expect(resources.calls).to.deep.equal([]);
  });
});
