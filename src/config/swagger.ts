import swaggerJsdoc from "swagger-jsdoc";

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: "3.0.0",
    info: {
      title: "Collectibles Admin API",
      version: "1.0.0",
      description: "Catalog and user administration API with bearer-token authentication",
      contact: {
        name: "API Support",
      },
    },
    servers: [
      {
        url: "http://localhost:4567",
        description: "Development server",
      },
    ],
    tags: [
      { name: "Health", description: "Health check endpoints" },
      { name: "Auth", description: "Registration, login and current user" },
      { name: "Admin", description: "User management" },
      { name: "Products", description: "Collectibles catalog" },
    ],
    components: {
      securitySchemes: {
        bearerAuth: { type: "http", scheme: "bearer", bearerFormat: "JWT" },
      },
      schemas: {
        RegisterRequest: {
          type: "object",
          required: ["username", "email", "password"],
          properties: {
            username: { type: "string", example: "alice" },
            email: { type: "string", example: "alice@example.com" },
            password: { type: "string", minLength: 6, maxLength: 200 },
            firstName: { type: "string" },
            lastName: { type: "string" },
            role: { type: "string", enum: ["ADMIN", "CUSTOMER", "MODERATOR"] },
          },
        },
        LoginRequest: {
          type: "object",
          required: ["usernameOrEmail", "password"],
          properties: {
            usernameOrEmail: { type: "string" },
            password: { type: "string" },
          },
        },
        ProductInput: {
          type: "object",
          required: ["name", "description", "price"],
          properties: {
            id: { type: "string" },
            name: { type: "string" },
            description: { type: "string" },
            price: { type: "number", example: 129.99 },
            currency: { type: "string", example: "USD" },
            category: { type: "string" },
            isActive: { type: "boolean" },
          },
        },
        Error: {
          type: "object",
          properties: {
            code: { type: "string" },
            message: { type: "string" },
            statusCode: { type: "integer" },
            details: {},
            timestamp: { type: "string", format: "date-time" },
          },
        },
      },
    },
  },
  apis: ["./src/app.ts", "./src/modules/**/*.routes.ts"],
};

export const swaggerSpec = swaggerJsdoc(options);
