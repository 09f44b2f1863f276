import type { Repositories } from "../repositories/types";
import type { BlobStore } from "../storage/blobStore";
import { bcryptHasher, type PasswordHasher } from "../utils/password";
import { IdentityService } from "./identity.service";
import { IdeaService } from "./idea.service";
import { VerificationService } from "./verification.service";
import { UserService } from "./user.service";

export interface CoreDeps {
  repos: Repositories;
  blobs: BlobStore;
  hasher?: PasswordHasher;
}

export interface Services {
  identity: IdentityService;
  ideas: IdeaService;
  verifications: VerificationService;
  users: UserService;
}

export function createServices({ repos, blobs, hasher = bcryptHasher() }: CoreDeps): Services {
  return {
    identity: new IdentityService(repos, hasher),
    ideas: new IdeaService(repos, blobs),
    verifications: new VerificationService(repos, blobs),
    users: new UserService(repos),
  };
}
