import { Request } from 'express';
import { TokenSubject } from '@cloudmedia/common/jwt';

export interface AuthenticatedRequest extends Request {
  user: TokenSubject;
}
