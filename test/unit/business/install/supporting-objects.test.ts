// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {Base64} from 'js-base64';
import {SupportingObjects} from '../../../../src/business/install/supporting-objects.js';
import {ApplyEngine} from '../../../../src/business/manifest/apply-engine.js';
import {type ResolvedDocument} from '../../../../src/business/manifest/document-resolver.js';
import {AdapterError} from '../../../../src/core/errors/adapter-error.js';
import {ResourceOperation} from '../../../../src/integration/kube/resources/resource-operation.js';
import {
  isStructuredDocument,
  type StructuredDocument,
} from '../../../../src/integration/kube/resources/dynamic/structured-document.js';
import {InMemoryResources} from '../../../helpers/in-memory-resources.js';
import {TEST_SETTINGS} from '../../../helpers/test-settings.js';
import {silentLogger} from '../../../helpers/test-logger.js';
import {rejectionOf} from '../../../helpers/rejection.js';

function dockerConfigOf(secret: StructuredDocument): unknown {
  const data: unknown = secret.data;
  if (!isStructuredDocument(data) || typeof data['.dockerconfigjson'] !== 'string') {
    throw new Error('secret carries no docker config');
  }
  return JSON.parse(Base64.decode(data['.dockerconfigjson']));
}

describe('SupportingObjects', (): void => {
  let resources: InMemoryResources;
  let engine: ApplyEngine;
  let supportingObjects: SupportingObjects;

  beforeEach((): void => {
    resources = new InMemoryResources();
    engine = new ApplyEngine(resources, silentLogger());
    supportingObjects = new SupportingObjects(TEST_SETTINGS, silentLogger());
  });

  describe('documents', (): void => {
    it('should list the namespace, pull secret and control plane settings in order', (): void => {
      const documents: ResolvedDocument[] = supportingObjects.documents('mesh');

      expect(documents.map((resolved: ResolvedDocument): string => resolved.coordinate.toString())).to.deep.equal([
        'core/v1/namespaces',
        'core/v1/secrets',
        'core/v1/configmaps',
      ]);
      expect(documents[0].document).to.deep.equal({apiVersion: 'v1', kind: 'Namespace', metadata: {name: 'mesh'}});
      expect(documents[1].document.metadata).to.deep.equal({name: 'docker-registry-secret', namespace: 'mesh'});
      expect(documents[1].document.type).to.equal('kubernetes.io/dockerconfigjson');
    });

    it('should encode the registry credentials as a docker config', (): void => {
      const [, secret] = supportingObjects.documents('mesh');

      expect(dockerConfigOf(secret.document)).to.deep.equal({
        auths: {
          'registry.example.test': {
            username: 'test-user',
            password: 'test-secret',
            auth: 'dGVzdC11c2VyOnRlc3Qtc2VjcmV0',
          },
        },
      });
    });

    it('should carry the control plane settings', (): void => {
      const [, , configMap] = supportingObjects.documents('mesh');

      expect(configMap.document.metadata).to.deep.equal({name: 'octarine-control-plane', namespace: 'mesh'});
      expect(configMap.document.data).to.deep.equal({
        account: 'test-account',
        'control-plane': 'control.example.test',
        domain: 'example.test',
      });
    });
  });

  describe('provision', (): void => {
    it('should create every object', async (): Promise<void> => {
      await supportingObjects.provision(engine, 'mesh');

      expect(resources.verbs()).to.deep.equal([
        'create namespaces/mesh -',
        'create secrets/docker-registry-secret mesh',
        'create configmaps/octarine-control-plane mesh',
      ]);
    });
  });

  describe('teardown', (): void => {
    it('should delete in reverse order', async (): Promise<void> => {
      await supportingObjects.provision(engine, 'mesh');
      resources.calls.length = 0;

      await supportingObjects.teardown(engine, 'mesh');

      expect(resources.verbs()).to.deep.equal([
        'delete configmaps/octarine-control-plane mesh',
        'delete secrets/docker-registry-secret mesh',
        'delete namespaces/mesh -',
      ]);
    });

    it('should skip objects that are already gone', async (): Promise<void> => {
      await supportingObjects.teardown(engine, 'mesh');

      expect(resources.verbs()).to.deep.equal([
        'delete configmaps/octarine-control-plane mesh',
        'delete configmaps/octarine-control-plane -',
        'delete secrets/docker-registry-secret mesh',
        'delete secrets/docker-registry-secret -',
        'delete namespaces/mesh -',
        'delete namespaces/mesh -',
      ]);
    });

    it('should stop at a failure other than absence', async (): Promise<void> => {
      await supportingObjects.provision(engine, 'mesh');
      resources.calls.length = 0;
      resources
        .failOn(ResourceOperation.DELETE, 'secrets', true)
        .failOn(ResourceOperation.DELETE, 'secrets', false);

      const error: unknown = await rejectionOf(supportingObjects.teardown(engine, 'mesh'));

      expect(error).to.be.instanceOf(AdapterError);
      expect(error).to.have.property('message', 'unable to delete the resource');
      expect(resources.verbs()).to.deep.equal([
        'delete configmaps/octarine-control-plane mesh',
        'delete secrets/docker-registry-secret mesh',
        'delete secrets/docker-registry-secret -',
      ]);
    });
  });
});
