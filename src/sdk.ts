/**
 * Library entry point.
 *
 * ```ts
 * const polarion = createPolarion();                // reads POLARION_* env vars
 * const items = polarion.workItems("MYPROJ");
 * const wi = await items.get("MYPROJ-42");
 * const edited = structuredClone(wi);
 * edited.attributes.known.status = "done";
 * await items.updateChanged(wi, edited);             // sends only `status`
 * ```
 */

import { createClient, PolarionClient } from "./client.js";
import { loadConfig, type PolarionConfig } from "./config.js";
import { ApprovalService } from "./services/approvals.js";
import { AttachmentService } from "./services/attachments.js";
import { CommentService } from "./services/comments.js";
import { EnumerationService } from "./services/enumerations.js";
import { LinkService } from "./services/links.js";
import { ProjectService } from "./services/projects.js";
import { UserGroupService } from "./services/user-groups.js";
import { UserService } from "./services/users.js";
import { WorkItemService } from "./services/work-items.js";
import { WorkRecordService } from "./services/work-records.js";

export class Polarion {
  readonly projects: ProjectService;
  readonly users: UserService;
  readonly userGroups: UserGroupService;
  /** Enumerations outside any project. */
  readonly enumerations: EnumerationService;

  constructor(readonly client: PolarionClient) {
    this.projects = new ProjectService(client);
    this.users = new UserService(client);
    this.userGroups = new UserGroupService(client);
    this.enumerations = new EnumerationService(client);
  }

  workItems(projectId: string): WorkItemService {
    return new WorkItemService(this.client, projectId);
  }

  projectEnumerations(projectId: string): EnumerationService {
    return new EnumerationService(this.client, projectId);
  }

  attachments(projectId: string, workItemId: string): AttachmentService {
    return new AttachmentService(this.client, projectId, workItemId);
  }

  approvals(projectId: string, workItemId: string): ApprovalService {
    return new ApprovalService(this.client, projectId, workItemId);
  }

  comments(projectId: string, workItemId: string): CommentService {
    return new CommentService(this.client, projectId, workItemId);
  }

  links(projectId: string, workItemId: string): LinkService {
    return new LinkService(this.client, projectId, workItemId);
  }

  workRecords(projectId: string, workItemId: string): WorkRecordService {
    return new WorkRecordService(this.client, projectId, workItemId);
  }
}

export function createPolarion(config: PolarionConfig = loadConfig()): Polarion {
  return new Polarion(createClient(config));
}

export * from "./batch.js";
export * from "./client.js";
export * from "./codec.js";
export * from "./config.js";
export * from "./custom-fields.js";
export * from "./custom-mapping.js";
export * from "./diff.js";
export * from "./errors.js";
export * from "./field-types.js";
export * from "./fields.js";
export * from "./models.js";
export * from "./resource.js";
export * from "./retry.js";
export * from "./schema.js";
export * from "./services/approvals.js";
export * from "./services/attachments.js";
export * from "./services/comments.js";
export * from "./services/document.js";
export * from "./services/enumerations.js";
export * from "./services/links.js";
export * from "./services/projects.js";
export * from "./services/user-groups.js";
export * from "./services/users.js";
export * from "./services/work-items.js";
export * from "./services/work-records.js";
