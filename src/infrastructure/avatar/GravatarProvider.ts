// Infrastructure: Gravatar default avatars

import { createHash } from 'node:crypto';
import type { IDefaultAvatarProvider } from '@/domain/avatar/types.js';

export function gravatarUrl(email: string, size = 200): string {
  const digest = createHash('md5').update(email.trim().toLowerCase()).digest('hex');
  return `https://www.gravatar.com/avatar/${digest}?s=${size}&d=identicon`;
}

export class GravatarProvider implements IDefaultAvatarProvider {
  async avatarFor(email: string): Promise<string | null> {
    return gravatarUrl(email);
  }
}
