// SPDX-License-Identifier: Apache-2.0

interface Outcome {
  readonly summary: string;
  readonly details: string;
}

/**
 * Event texts of one background operation.
 */
export interface WorkflowMessages {
  readonly deployed: Outcome;
  readonly removed: Outcome;
  readonly deployFailed: string;
  readonly removeFailed: string;
}

export const INSTALL_MESSAGES: WorkflowMessages = {
  deployed: {
    summary: 'Octarine deployed successfully',
    details: 'The latest version of Octarine is now deployed.',
  },
  removed: {
    summary: 'Octarine removed successfully',
    details: 'The latest version of Octarine is now removed.',
  },
  deployFailed: 'Error while deploying Octarine',
  removeFailed: 'Error while removing Octarine',
};

export const DEMO_APP_MESSAGES: WorkflowMessages = {
  deployed: {
    summary: 'Book Info app deployed successfully',
    details: 'The canonical Book Info app is now deployed.',
  },
  removed: {
    summary: 'Book Info app removed successfully',
    details: 'The canonical Book Info app is now removed.',
  },
  deployFailed: 'Error while deploying the canonical Book Info App',
  removeFailed: 'Error while removing the canonical Book Info App',
};

const VET_PASSED: Outcome = {
  summary: 'Octarine vet completed',
  details: 'All Octarine supporting objects are present.',
};

// vet reads only, so removal requests report like installs
export const VET_MESSAGES: WorkflowMessages = {
  deployed: VET_PASSED,
  removed: VET_PASSED,
  deployFailed: 'Octarine vet found issues',
  removeFailed: 'Octarine vet found issues',
};
