// SPDX-License-Identifier: Apache-2.0

export enum DeletionPropagation {
  BACKGROUND = 'Background',
  FOREGROUND = 'Foreground',
  ORPHAN = 'Orphan',
}
