/**
 * Built-in Polarion resource schemas.
 *
 * Only the standard fields Polarion defines for every project are listed;
 * project-specific custom fields are carried by the custom partitions.
 */

import type { AttributeSet, Resource } from "./resource.js";
import { type AttributesOf, defineSchema, field } from "./schema.js";

// ─── Work items ────────────────────────────────────────────────────────────

export const WORK_ITEM_SCHEMA = defineSchema({
  type: "workitems",
  attributes: {
    type: field.string(),
    title: field.string(),
    description: field.text(),
    status: field.string(),
    resolution: field.string(),
    priority: field.string(),
    severity: field.string(),
    dueDate: field.date(),
    plannedStart: field.dateTime(),
    plannedEnd: field.dateTime(),
    initialEstimate: field.string(),
    remainingEstimate: field.string(),
    timeSpent: field.string(),
    outlineNumber: field.string(),
    hyperlinks: field.hyperlinks(),
    created: field.dateTime(),
    updated: field.dateTime(),
    resolvedOn: field.dateTime(),
  },
  relationships: [
    "assignee",
    "author",
    "categories",
    "linkedWorkItems",
    "attachments",
    "comments",
    "externallyLinkedWorkItems",
    "linkedOslcResources",
    "module",
    "plan",
    "project",
    "votes",
    "watches",
    "workRecords",
    "approvals",
  ],
  readOnly: ["created", "updated", "resolvedOn", "outlineNumber"],
  readOnlyRelationships: [
    "author",
    "project",
    "module",
    "linkedWorkItems",
    "externallyLinkedWorkItems",
    "attachments",
    "comments",
    "workRecords",
    "approvals",
  ],
});

export type WorkItemAttributes = AttributesOf<typeof WORK_ITEM_SCHEMA.attributes>;
export type WorkItemRelationship = (typeof WORK_ITEM_SCHEMA.relationships)[number];
export type WorkItem = Resource<WorkItemAttributes, WorkItemRelationship>;

/** New, unsaved work item of the given Polarion work item type. */
export function newWorkItem(
  workItemType: string,
  known: Omit<Partial<WorkItemAttributes>, "type">,
  custom: AttributeSet<WorkItemAttributes>["custom"] = {},
): WorkItem {
  return {
    type: WORK_ITEM_SCHEMA.type,
    attributes: { known: { ...known, type: workItemType }, custom: { ...custom } },
  };
}

// ─── Users ─────────────────────────────────────────────────────────────────

export const USER_SCHEMA = defineSchema({
  type: "users",
  attributes: {
    name: field.string(),
    initials: field.string(),
    email: field.string(),
    description: field.text(),
    disabledNotifications: field.boolean(),
  },
  relationships: ["avatar", "userGroups", "globalRoles", "projectRoles"],
});

export type UserAttributes = AttributesOf<typeof USER_SCHEMA.attributes>;
export type User = Resource<UserAttributes, (typeof USER_SCHEMA.relationships)[number]>;

// ─── Projects ──────────────────────────────────────────────────────────────

export const PROJECT_SCHEMA = defineSchema({
  type: "projects",
  attributes: {
    id: field.string(),
    name: field.string(),
    description: field.text(),
    active: field.boolean(),
    trackerPrefix: field.string(),
    color: field.string(),
    icon: field.string(),
    lockWorkRecordsDate: field.date(),
    start: field.date(),
    finish: field.date(),
  },
  relationships: ["lead"],
});

export type ProjectAttributes = AttributesOf<typeof PROJECT_SCHEMA.attributes>;
export type Project = Resource<ProjectAttributes, (typeof PROJECT_SCHEMA.relationships)[number]>;

// ─── Work item attachments ─────────────────────────────────────────────────

export const ATTACHMENT_SCHEMA = defineSchema({
  type: "workitem_attachments",
  attributes: {
    id: field.string(),
    fileName: field.string(),
    title: field.string(),
    length: field.number(),
    updated: field.dateTime(),
  },
  relationships: ["author", "project"],
  readOnly: ["updated", "length"],
});

export type AttachmentAttributes = AttributesOf<typeof ATTACHMENT_SCHEMA.attributes>;
export type Attachment = Resource<AttachmentAttributes, (typeof ATTACHMENT_SCHEMA.relationships)[number]>;

// ─── Work item approvals ───────────────────────────────────────────────────

export const APPROVAL_STATUSES = ["waiting", "approved", "disapproved"] as const;
export type ApprovalStatus = (typeof APPROVAL_STATUSES)[number];

export const APPROVAL_SCHEMA = defineSchema({
  type: "workitem_approvals",
  attributes: {
    status: field.string(),
    comment: field.string(),
  },
  relationships: ["user"],
});

export type ApprovalAttributes = AttributesOf<typeof APPROVAL_SCHEMA.attributes>;
export type Approval = Resource<ApprovalAttributes, (typeof APPROVAL_SCHEMA.relationships)[number]>;

// ─── Enumerations ──────────────────────────────────────────────────────────

export const ENUMERATION_SCHEMA = defineSchema({
  type: "enumerations",
  attributes: {
    enumContext: field.string(),
    enumName: field.string(),
    targetType: field.string(),
  },
});

export type EnumerationAttributes = AttributesOf<typeof ENUMERATION_SCHEMA.attributes>;
export type Enumeration = Resource<EnumerationAttributes, never>;

// ─── Work item comments ────────────────────────────────────────────────────

export const COMMENT_SCHEMA = defineSchema({
  type: "workitem_comments",
  attributes: {
    id: field.string(),
    title: field.string(),
    text: field.text(),
    resolved: field.boolean(),
    resolvedOn: field.dateTime(),
    created: field.dateTime(),
    updated: field.dateTime(),
  },
  relationships: ["author", "parentComment", "childComments", "project"],
  readOnly: ["id", "created", "updated", "resolvedOn"],
  readOnlyRelationships: ["author", "childComments", "project"],
});

export type CommentAttributes = AttributesOf<typeof COMMENT_SCHEMA.attributes>;
export type WorkItemComment = Resource<CommentAttributes, (typeof COMMENT_SCHEMA.relationships)[number]>;

// ─── Work item links ───────────────────────────────────────────────────────

export const LINK_SCHEMA = defineSchema({
  type: "linkedworkitems",
  attributes: {
    id: field.string(),
    role: field.string(),
    suspect: field.boolean(),
    /** Pins the link to a revision of the target. */
    revision: field.string(),
  },
  relationships: ["workItem"],
  readOnly: ["id", "role"],
  readOnlyRelationships: ["workItem"],
});

export type LinkAttributes = AttributesOf<typeof LINK_SCHEMA.attributes>;
export type WorkItemLink = Resource<LinkAttributes, (typeof LINK_SCHEMA.relationships)[number]>;

// ─── Work records ──────────────────────────────────────────────────────────

export const WORK_RECORD_SCHEMA = defineSchema({
  type: "workrecords",
  attributes: {
    id: field.string(),
    date: field.date(),
    timeSpent: field.string(),
    comment: field.text(),
  },
  relationships: ["user", "project"],
  readOnly: ["id"],
  readOnlyRelationships: ["project"],
});

export type WorkRecordAttributes = AttributesOf<typeof WORK_RECORD_SCHEMA.attributes>;
export type WorkRecord = Resource<WorkRecordAttributes, (typeof WORK_RECORD_SCHEMA.relationships)[number]>;

// ─── User groups ───────────────────────────────────────────────────────────

export const USER_GROUP_SCHEMA = defineSchema({
  type: "usergroups",
  attributes: {
    id: field.string(),
    name: field.string(),
    description: field.text(),
  },
  relationships: ["users", "globalRoles", "projectRoles"],
});

export type UserGroupAttributes = AttributesOf<typeof USER_GROUP_SCHEMA.attributes>;
export type UserGroup = Resource<UserGroupAttributes, (typeof USER_GROUP_SCHEMA.relationships)[number]>;
