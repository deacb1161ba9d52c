export { errorHandler } from './errorHandler';
export { notFound } from './notFound';
export { requestLogger } from './requestLogger';
export { validate, commonSchemas } from './validateRequest';
export { requireUser, getCurrentUser, setCurrentUser } from './currentUser';
