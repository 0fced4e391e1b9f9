// SPDX-License-Identifier: Apache-2.0

export class ValueContainer<T = unknown> {
  public constructor(
    public readonly token: symbol,
    public readonly useValue: T,
  ) {}
}
