import Ajv, { JSONSchemaType, ValidateFunction } from 'ajv';

// Query strings and path params arrive as strings; coercion turns them into numbers/booleans in place
const ajv = new Ajv({ allErrors: true, coerceTypes: true });

export interface CreateReviewBody {
  posId: number;
  authorId: number;
  review: string;
}

export interface UpdateReviewBody {
  review: string;
}

export interface ReviewIdParams {
  id: number;
}

export interface ApproveQuery {
  user_id: number;
}

export interface FilterQuery {
  pos_id: number;
  approved: boolean;
}

const createReviewSchema: JSONSchemaType<CreateReviewBody> = {
  type: 'object',
  properties: {
    posId: { type: 'integer', minimum: 1 },
    authorId: { type: 'integer', minimum: 1 },
    review: { type: 'string', minLength: 1, maxLength: 2000 },
  },
  required: ['posId', 'authorId', 'review'],
  additionalProperties: false,
};

const updateReviewSchema: JSONSchemaType<UpdateReviewBody> = {
  type: 'object',
  properties: {
    review: { type: 'string', minLength: 1, maxLength: 2000 },
  },
  required: ['review'],
  additionalProperties: false,
};

const reviewIdSchema: JSONSchemaType<ReviewIdParams> = {
  type: 'object',
  properties: {
    id: { type: 'integer', minimum: 1 },
  },
  required: ['id'],
};

const approveQuerySchema: JSONSchemaType<ApproveQuery> = {
  type: 'object',
  properties: {
    user_id: { type: 'integer', minimum: 1 },
  },
  required: ['user_id'],
};

const filterQuerySchema: JSONSchemaType<FilterQuery> = {
  type: 'object',
  properties: {
    pos_id: { type: 'integer', minimum: 1 },
    approved: { type: 'boolean' },
  },
  required: ['pos_id', 'approved'],
};

export const validateCreateReview: ValidateFunction<CreateReviewBody> = ajv.compile(createReviewSchema);
export const validateUpdateReview: ValidateFunction<UpdateReviewBody> = ajv.compile(updateReviewSchema);
export const validateReviewId: ValidateFunction<ReviewIdParams> = ajv.compile(reviewIdSchema);
export const validateApproveQuery: ValidateFunction<ApproveQuery> = ajv.compile(approveQuerySchema);
export const validateFilterQuery: ValidateFunction<FilterQuery> = ajv.compile(filterQuerySchema);

/** Human-readable summary of the last validation failure */
export function describeErrors(validate: ValidateFunction): string {
  return ajv.errorsText(validate.errors, { separator: '; ' });
}
