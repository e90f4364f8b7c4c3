/**
 * Bus Protocol - Validation Schemas
 *
 * Zod schemas for header names and per-type header requirements. Messages
 * are validated once, when they are constructed.
 */

import { z } from 'zod';
import { MessageType } from './types';

// ============================================================================
// Constants
// ============================================================================

/** Maximum length of any bus name (interface, member, error, bus name) */
export const MAX_NAME_LENGTH = 255;

export const OBJECT_PATH_PATTERN = /^\/$|^(\/[A-Za-z0-9_]+)+$/;
export const MEMBER_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
export const INTERFACE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)+$/;
export const UNIQUE_BUS_NAME_PATTERN = /^:[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)+$/;
export const WELL_KNOWN_BUS_NAME_PATTERN = /^[A-Za-z_-][A-Za-z0-9_-]*(\.[A-Za-z_-][A-Za-z0-9_-]*)+$/;

// ============================================================================
// Name Schemas
// ============================================================================

export const ObjectPathSchema = z
  .string()
  .regex(OBJECT_PATH_PATTERN, 'must be an absolute object path like /org/example/Object');

export const MemberNameSchema = z
  .string()
  .max(MAX_NAME_LENGTH)
  .regex(MEMBER_NAME_PATTERN, 'must be a member name like Frobate');

export const InterfaceNameSchema = z
  .string()
  .max(MAX_NAME_LENGTH)
  .regex(INTERFACE_NAME_PATTERN, 'must be a dotted interface name like org.example.Iface');

/** Error names follow the interface name grammar */
export const ErrorNameSchema = InterfaceNameSchema;

export const BusNameSchema = z
  .string()
  .max(MAX_NAME_LENGTH)
  .refine(
    (name) => UNIQUE_BUS_NAME_PATTERN.test(name) || WELL_KNOWN_BUS_NAME_PATTERN.test(name),
    'must be a unique (:1.42) or well-known (org.example.Service) bus name'
  );

const SerialSchema = z.number().int().positive().max(0xffffffff);

// ============================================================================
// Header Schema
// ============================================================================

/**
 * Header schema with the per-type required fields:
 * - method calls need path and member
 * - signals need path, interface and member
 * - errors need an error name and a reply serial
 * - method returns need a reply serial
 */
export const MessageHeaderSchema = z
  .object({
    type: z.nativeEnum(MessageType),
    path: ObjectPathSchema.optional(),
    interface: InterfaceNameSchema.optional(),
    member: MemberNameSchema.optional(),
    errorName: ErrorNameSchema.optional(),
    destination: BusNameSchema.optional(),
    sender: BusNameSchema.optional(),
    serial: SerialSchema.optional(),
    replySerial: SerialSchema.optional(),
    noReplyExpected: z.boolean().optional()
  })
  .superRefine((header, ctx) => {
    const require = (field: keyof typeof header) => {
      if (header[field] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `required for ${header.type} messages`
        });
      }
    };

    switch (header.type) {
      case MessageType.METHOD_CALL:
        require('path');
        require('member');
        break;
      case MessageType.SIGNAL:
        require('path');
        require('interface');
        require('member');
        break;
      case MessageType.ERROR:
        require('errorName');
        require('replySerial');
        break;
      case MessageType.METHOD_RETURN:
        require('replySerial');
        break;
    }
  });

export type ValidatedMessageHeader = z.infer<typeof MessageHeaderSchema>;
