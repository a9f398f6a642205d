/**
 * Sentinel domain errors shared by every service.
 */

import { DomainError } from './domainError';

/** Invalid or malformed input, typically a body that could not be parsed */
export const ErrBadInput = DomainError.create(
  'BAD_INPUT',
  'Algo deu errado com os dados informados. Verifique e tente novamente.'
);

/** A request that parsed but failed validation */
export const ErrRequestValidation = DomainError.create(
  'REQUEST_VALIDATION',
  'Não foi possível concluir requisição. Verifique os dados informados e tente novamente.'
);

/** The requested action is not permitted */
export const ErrActionDenied = DomainError.create(
  'ACTION_DENIED',
  'Você não tem permissão para realizar esta ação. Se precisar de acesso, contate o administrador.'
);

/** Unauthenticated access attempt */
export const ErrUnauthorized = DomainError.create(
  'UNAUTHORIZED',
  'Você não tem autorização para acessar este recurso.'
);
