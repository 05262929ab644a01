   import jwt from 'jsonwebtoken';

   export interface TokenPayload {
     sub: string; // user ID
     role?: string;
     iat?: number;
   }

   const JWT_SECRET = process.env.JWT_SECRET || 'dev-secret-change-in-prod';
   const ISSUER = 'civic-eye';

   export const generateAccessToken = (userId: string, role?: string): string => {
     return jwt.sign({ sub: userId, role }, JWT_SECRET, {
       expiresIn: '1h',
       issuer: ISSUER,
       algorithm: 'HS256',
     });
   };

   export const verifyAccessToken = (token: string): TokenPayload | null => {
     try {
       const decoded = jwt.verify(token, JWT_SECRET, {
         algorithms: ['HS256'],
         issuer: ISSUER,
       });
       if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
         return null;
       }
       return {
         sub: decoded.sub,
         role: typeof decoded.role === 'string' ? decoded.role : undefined,
         iat: decoded.iat,
       };
     } catch {
       return null;
     }
   };
