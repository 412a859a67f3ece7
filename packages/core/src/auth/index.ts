export { hashPassword, verifyPassword, safeEqual } from './password.js';
