/**
 * uuid stand-in for Jest: a fixed v4 so request ids are predictable.
 */

export const v4 = jest.fn(() => '550e8400-e29b-41d4-a716-446655440000');

export default { v4 };
