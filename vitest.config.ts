import { defineConfig } from 'vitest/config';

export default defineConfig({
  // 테스트 설정 (Vitest)
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 60000, // 대용량 합성 데이터 테스트를 위해 타임아웃 연장
  },
});
