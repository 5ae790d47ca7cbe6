/**
 * Tests for synthesized request/response schema names
 */

import { describe, it, expect } from 'vitest';
import { reduceOperationId, synthesize } from './name-synthesizer.js';

describe('reduceOperationId', () => {
  it('should strip API prefixes and join title-cased words', () => {
    expect(reduceOperationId('_api_v1_list_users')).toBe('ListUsers');
    expect(reduceOperationId('create_order_api_item')).toBe('CreateOrderitem');
  });

  it('should lower-case everything after the first letter of a word', () => {
    expect(reduceOperationId('getUSER_byID')).toBe('GetuserByid');
  });

  it('should start a new word after other separators', () => {
    expect(reduceOperationId('get-user')).toBe('Get-User');
    expect(reduceOperationId('list_users.v2')).toBe('ListUsers.V2');
    expect(reduceOperationId('v2beta_items')).toBe('V2betaItems');
  });
});

describe('synthesize', () => {
  it('should name request bodies', () => {
    expect(synthesize('create_user', '/users', 'POST', false)).toBe('CreateUserRequest');
  });

  it('should put the status code before the response suffix', () => {
    expect(synthesize('create_user', '/users', 'POST', true, '201')).toBe('CreateUser201Response');
  });

  it('should ignore the status code for requests', () => {
    expect(synthesize('create_user', '/users', 'POST', false, '201')).toBe('CreateUserRequest');
  });

  it('should be deterministic', () => {
    expect(synthesize('get_user', '/users/{id}', 'GET', true, '200'))
      .toBe(synthesize('get_user', '/users/{id}', 'GET', true, '200'));
  });

  it('should not depend on path or method when an operation id is present', () => {
    expect(synthesize('update_item', '/a', 'PUT', false)).toBe(synthesize('update_item', '/b', 'PATCH', false));
  });

  it('should give colliding names for ids that reduce to the same words', () => {
    expect(synthesize('_api_v1_list_users', '/v1/users', 'GET', true, '200')).toBe('ListUsers200Response');
    expect(synthesize('list_users', '/users', 'GET', true, '200')).toBe('ListUsers200Response');
  });

  it('should fall back to method and path without an operation id', () => {
    expect(synthesize(undefined, '/users/{id}', 'GET', false)).toBe('GetUsersIdRequest');
    expect(synthesize('', '/orders', 'POST', true, '400')).toBe('PostOrders400Response');
  });
});
