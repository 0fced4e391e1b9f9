// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {ApplyEngine} from '../../../../src/business/manifest/apply-engine.js';
import {DocumentResolver, type ResolvedDocument} from '../../../../src/business/manifest/document-resolver.js';
import {ResourceCoordinate} from '../../../../src/integration/kube/resources/dynamic/resource-coordinate.js';
import {ResourceOperation} from '../../../../src/integration/kube/resources/resource-operation.js';
import {AdapterError} from '../../../../src/core/errors/adapter-error.js';
import {InMemoryResources} from '../../../helpers/in-memory-resources.js';
import {silentLogger} from '../../../helpers/test-logger.js';
import {rejectionOf} from '../../../helpers/rejection.js';

const CONFIG_MAPS: ResourceCoordinate = ResourceCoordinate.of('', 'v1', 'configmaps');
const DEPLOYMENTS: ResourceCoordinate = ResourceCoordinate.of('apps', 'v1', 'deployments');

function resolveOne(segment: string, namespace: string): ResolvedDocument {
  const [resolved] = DocumentResolver.resolve(segment, namespace);
  return resolved;
}

const CONFIG_MAP: string = 'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: settings\ndata:\n  mode: fresh\n';
const DEPLOYMENT: string = 'apiVersion: apps/v1\nkind: Deployment\nmetadata:\n  name: web\nspec:\n  replicas: 3\n';

describe('ApplyEngine', (): void => {
  let resources: InMemoryResources;
  let engine: ApplyEngine;

  beforeEach((): void => {
    resources = new InMemoryResources();
    engine = new ApplyEngine(resources, silentLogger());
  });

  describe('apply', (): void => {
    it('should stop after a successful namespaced create', async (): Promise<void> => {
      await engine.execute(resolveOne(CONFIG_MAP, 'team-a'), false);

      expect(resources.verbs()).to.deep.equal(['create configmaps/settings team-a']);
      expect(resources.stored(CONFIG_MAPS, 'team-a', 'settings')).to.have.nested.property('data.mode', 'fresh');
    });

    it('should retry the create without a namespace and never read or update', async (): Promise<void> => {
      resources.failOn(ResourceOperation.CREATE, 'configmaps', true);

      await engine.execute(resolveOne(CONFIG_MAP, 'team-a'), false);

      expect(resources.verbs()).to.deep.equal([
        'create configmaps/settings team-a',
        'create configmaps/settings -',
      ]);
    });

    it('should update with the retrieved object when both creates fail', async (): Promise<void> => {
      resources
        .seed(CONFIG_MAPS, 'team-a', {
          apiVersion: 'v1',
          kind: 'ConfigMap',
          metadata: {name: 'settings', namespace: 'team-a', resourceVersion: '7'},
          data: {mode: 'stale'},
        })
        .failOn(ResourceOperation.CREATE, 'configmaps', false);

      await engine.execute(resolveOne(CONFIG_MAP, 'team-a'), false);

      expect(resources.verbs()).to.deep.equal([
        'create configmaps/settings team-a',
        'create configmaps/settings -',
        'get configmaps/settings team-a',
        'update configmaps/settings team-a',
      ]);
      expect(resources.calls[3].document).to.have.nested.property('metadata.resourceVersion', '7');
      expect(resources.calls[3].document).to.have.nested.property('data.mode', 'stale');
    });

    it('should surface the read failure when the object cannot be retrieved', async (): Promise<void> => {
      resources
        .failOn(ResourceOperation.CREATE, 'configmaps', true)
        .failOn(ResourceOperation.CREATE, 'configmaps', false);

      const error: unknown = await rejectionOf(engine.execute(resolveOne(CONFIG_MAP, 'team-a'), false));

      expect(error).to.be.instanceOf(AdapterError);
      expect(error).to.have.property('message', 'unable to retrieve the resource');
      expect(resources.verbs()).to.deep.equal([
        'create configmaps/settings team-a',
        'create configmaps/settings -',
        'get configmaps/settings team-a',
        'get configmaps/settings -',
      ]);
    });
  });

  describe('delete', (): void => {
    it('should never delete the default namespace', async (): Promise<void> => {
      await engine.execute(resolveOne('apiVersion: v1\nkind: Namespace\nmetadata:\n  name: default\n', ''), true);

      expect(resources.calls).to.deep.equal([]);
    });

    it('should scale a deployment to zero before deleting it in the background', async (): Promise<void> => {
      resources.seed(DEPLOYMENTS, 'team-a', {
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: {name: 'web', namespace: 'team-a'},
        spec: {replicas: 3},
      });

      await engine.execute(resolveOne(DEPLOYMENT, 'team-a'), true);

      expect(resources.verbs()).to.deep.equal([
        'get deployments/web team-a',
        'update deployments/web team-a',
        'delete deployments/web team-a',
      ]);
      expect(resources.calls[1].document).to.have.nested.property('spec.replicas', 0);
      expect(resources.calls[2].propagation).to.equal('Background');
      expect(resources.stored(DEPLOYMENTS, 'team-a', 'web')).to.be.undefined;
    });

    it('should retry the delete without a namespace', async (): Promise<void> => {
      resources.seed(CONFIG_MAPS, undefined, {apiVersion: 'v1', kind: 'ConfigMap', metadata: {name: 'settings'}});

      await engine.execute(resolveOne(CONFIG_MAP, 'team-a'), true);

      expect(resources.verbs()).to.deep.equal([
        'delete configmaps/settings team-a',
        'delete configmaps/settings -',
      ]);
      expect(resources.stored(CONFIG_MAPS, undefined, 'settings')).to.be.undefined;
    });

    it('should keep the not found cause when neither delete finds the object', async (): Promise<void> => {
      const error: unknown = await rejectionOf(engine.execute(resolveOne(CONFIG_MAP, 'team-a'), true));

      expect(error).to.be.instanceOf(AdapterError);
      expect(error).to.have.property('message', 'unable to delete the resource');
      expect(error).to.have.nested.property('cause.message', "delete configmaps 'settings' without namespace: not found");
    });
  });
});
