// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {FileManifestSource} from '../../../../src/business/install/manifest-source.js';
import {ManifestSplitter} from '../../../../src/business/manifest/manifest-splitter.js';
import {DocumentResolver, type ResolvedDocument} from '../../../../src/business/manifest/document-resolver.js';
import {TemplateRenderer} from '../../../../src/core/template-renderer.js';
import {MANIFESTS_DIR, TEMPLATES_DIR} from '../../../../src/core/constants.js';
import {AdapterError} from '../../../../src/core/errors/adapter-error.js';
import {TemplateRenderError} from '../../../../src/core/errors/template-render-error.js';
import {documentKind, documentName} from '../../../../src/integration/kube/resources/dynamic/structured-document.js';
import {TEST_SETTINGS} from '../../../helpers/test-settings.js';
import {rejectionOf} from '../../../helpers/rejection.js';

function resolveAll(manifest: string): ResolvedDocument[] {
  return ManifestSplitter.split(manifest).flatMap((segment: string): ResolvedDocument[] =>
    DocumentResolver.resolve(segment, ''),
  );
}

function describeDocument({document}: ResolvedDocument): string {
  return `${documentKind(document)}/${documentName(document)} ${document.metadata?.namespace ?? '-'}`;
}

describe('FileManifestSource', (): void => {
  const renderer: TemplateRenderer = new TemplateRenderer(TEMPLATES_DIR);

  it('should render the dataplane manifest for the namespace', async (): Promise<void> => {
    const source: FileManifestSource = new FileManifestSource(renderer, MANIFESTS_DIR, TEST_SETTINGS);

    const resolved: ResolvedDocument[] = resolveAll(await source.dataplaneManifest('mesh-system'));

    expect(resolved.map(describeDocument)).to.deep.equal([
      'ServiceAccount/octarine-dataplane mesh-system',
      'ClusterRole/octarine-dataplane -',
      'ClusterRoleBinding/octarine-dataplane -',
      'Deployment/octarine-guard mesh-system',
      'Service/octarine-guard mesh-system',
    ]);
    expect(resolved[3].document).to.have.nested.property('spec.template.spec.containers[0].env').that.deep.equals([
      {name: 'OCTARINE_ACCOUNT', value: 'test-account'},
      {name: 'OCTARINE_CONTROL_PLANE', value: 'control.example.test'},
      {name: 'OCTARINE_DOMAIN', value: 'example.test'},
    ]);
  });

  it('should read the demo application manifest', async (): Promise<void> => {
    const source: FileManifestSource = new FileManifestSource(renderer, MANIFESTS_DIR, TEST_SETTINGS);

    const resolved: ResolvedDocument[] = resolveAll(await source.demoManifest());

    expect(resolved.map(describeDocument)).to.deep.equal([
      'Service/details -',
      'Deployment/details-v1 -',
      'Service/ratings -',
      'Deployment/ratings-v1 -',
      'Service/reviews -',
      'Deployment/reviews-v1 -',
      'Service/productpage -',
      'Deployment/productpage-v1 -',
    ]);
  });

  it('should report a missing manifests directory', async (): Promise<void> => {
    const source: FileManifestSource = new FileManifestSource(renderer, '/nonexistent/manifests', TEST_SETTINGS);

    const demoError: unknown = await rejectionOf(source.demoManifest());
    const dataplaneError: unknown = await rejectionOf(source.dataplaneManifest('mesh-system'));

    expect(demoError).to.be.instanceOf(AdapterError);
    expect(demoError).to.have.property('message', 'unable to read the demo application manifest');
    expect(dataplaneError).to.be.instanceOf(TemplateRenderError);
  });
});
