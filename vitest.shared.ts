export const sharedConfig = {
  test: {
    environment: "node" as const,
    include: ["src/**/*.test.ts"],
  },
};
