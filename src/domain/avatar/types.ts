// Domain: Avatar image hosting contract

export interface AvatarUpload {
  body: Buffer;
  contentType: string;
}

export interface IAvatarStore {
  /**
   * Store the image under an opaque public id and return a public URL
   */
  upload(image: AvatarUpload, publicId: string): Promise<string>;
}

/**
 * Default avatar for a freshly registered user; null when none is available
 */
export interface IDefaultAvatarProvider {
  avatarFor(email: string): Promise<string | null>;
}
