import "reflect-metadata";

process.env.JWT_SECRET = "test-secret";
process.env.BACKOFFICE_BASIC_USER = "admin";
process.env.BACKOFFICE_BASIC_PASS = "test-password";
