/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { versionSchema } from './schemas';
import type { Version } from './types';

/**
 * Parse a version segment taken from an index entry path
 * @returns Canonical version, or null if the segment is not a valid version
 */
export function parseVersion(raw: string): Version | null {
  const result = versionSchema.safeParse(raw);
  return result.success ? result.data : null;
}

/**
 * Order canonical versions component by component.
 * Components carry no leading zeros, so a longer digit string is larger.
 */
export function compareVersions(a: Version, b: Version): number {
  const left = a.split('.');
  const right = b.split('.');
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i];
    const y = right[i];
    if (x.length !== y.length) {
      return x.length - y.length;
    }
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }

  return left.length - right.length;
}

export function sortVersions(versions: Iterable<Version>): Version[] {
  return [...versions].sort(compareVersions);
}
