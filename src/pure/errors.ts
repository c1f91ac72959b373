import {DomainError} from './types';

export const notFound = (message: string): DomainError => ({type: 'not_found', message});

export const invalidState = (message: string): DomainError => ({type: 'invalid_state', message});

export const invalidOrder = (message: string): DomainError => ({type: 'invalid_order', message});
