export * from './password.service';
export * from './url-signer.service';
export * from './crypto.module';
