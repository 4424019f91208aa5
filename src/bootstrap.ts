// Composition root
// Wires repositories, services and the HTTP app; adapters are injectable so tests can swap them

import { createApp, type AppOptions, type CreatedApp } from '@/api/app.js';
import { createAuthModule } from '@/api/middleware/AuthModule.js';
import { AuthService } from '@/application/auth/AuthService.js';
import { IdentityService } from '@/application/auth/IdentityService.js';
import { PasswordHasher } from '@/application/auth/PasswordHasher.js';
import { createTokenService } from '@/application/auth/TokenService.js';
import { ContactService } from '@/application/contacts/ContactService.js';
import { BackgroundTasks } from '@/application/shared/BackgroundTasks.js';
import type { IAvatarStore, IDefaultAvatarProvider } from '@/domain/avatar/types.js';
import type { IMailer } from '@/domain/mail/types.js';
import type { IUserLookup } from '@/domain/user/repository.js';
import { CachedUserLookup, defaultIdentityCacheConfig } from '@/infrastructure/cache/IdentityCache.js';
import type { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import type { AuthConfig } from '@/utils/config.js';

export interface ContactBookOptions {
  db: DatabaseService;
  auth: AuthConfig;
  publicUrl: string;
  mailer: IMailer;
  avatars: IAvatarStore;
  defaultAvatars: IDefaultAvatarProvider;
  http?: Partial<AppOptions>;
}

export interface ContactBook extends CreatedApp {
  authService: AuthService;
  contactService: ContactService;
  identityService: IdentityService;
  tasks: BackgroundTasks;
  /** Wait for background mail, then stop timers */
  shutdown(): Promise<void>;
}

export function createContactBook(options: ContactBookOptions): ContactBook {
  const { db, auth } = options;

  const tokens = createTokenService(auth);
  const hasher = new PasswordHasher(auth.bcryptRounds);
  const tasks = new BackgroundTasks();

  let lookup: IUserLookup = db.users;
  let cache: CachedUserLookup | null = null;
  if (auth.identityCacheEnabled && auth.identityCacheTtlSeconds > 0) {
    cache = new CachedUserLookup(db.users, {
      ...defaultIdentityCacheConfig(),
      ttlMs: auth.identityCacheTtlSeconds * 1000,
    });
    lookup = cache;
  }

  const identityService = new IdentityService(tokens, lookup);
  const authService = new AuthService(
    {
      users: db.users,
      hasher,
      tokens,
      mailer: options.mailer,
      avatars: options.avatars,
      defaultAvatars: options.defaultAvatars,
      tasks,
    },
    { publicUrl: options.publicUrl }
  );
  const contactService = new ContactService(db.contacts);

  const { app, stop } = createApp(
    { authService, contactService, authModule: createAuthModule(identityService), db },
    options.http
  );

  const stopAll = (): void => {
    stop();
    cache?.stop();
  };

  return {
    app,
    authService,
    contactService,
    identityService,
    tasks,
    stop: stopAll,
    shutdown: async () => {
      await tasks.drain();
      stopAll();
    },
  };
}
