/**
 * Image profile: what a built image is expected to contain.
 * Profiles are plain JSON so one verifier serves every image variant.
 */

export type PackageExpectation = {
  name?: string
  required: string[]
}

export type UserExpectation = {
  name?: string
  user: string
  /** groups the user must belong to; empty or missing checks existence only */
  groups?: string[]
}

export type FileExpectation = {
  name?: string
  path: string
  /** a symlink passes even when its target is missing */
  allowSymlink?: boolean
  /** exact octal permission bits, e.g. "0755" */
  mode?: string
}

export type CommandExpectation = {
  name?: string
  command: string
  stdoutContains: string
}

export type ImageProfile = {
  name: string
  description?: string
  packages?: PackageExpectation
  users?: UserExpectation[]
  files?: FileExpectation[]
  commands?: CommandExpectation[]
}

const checkName = { type: 'string', minLength: 1 } as const

export const profileJsonSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    packages: {
      type: 'object',
      additionalProperties: false,
      required: ['required'],
      properties: {
        name: checkName,
        required: { type: 'array', items: { type: 'string', minLength: 1 } },
      },
    },
    users: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['user'],
        properties: {
          name: checkName,
          user: { type: 'string', minLength: 1 },
          groups: { type: 'array', items: { type: 'string', minLength: 1 } },
        },
      },
    },
    files: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['path'],
        properties: {
          name: checkName,
          path: { type: 'string', minLength: 1 },
          allowSymlink: { type: 'boolean' },
          mode: { type: 'string', pattern: '^0?[0-7]{3,4}$' },
        },
      },
    },
    commands: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['command', 'stdoutContains'],
        properties: {
          name: checkName,
          command: { type: 'string', minLength: 1 },
          stdoutContains: { type: 'string', minLength: 1 },
        },
      },
    },
  },
} as const

export default profileJsonSchema
