/** A minimal valid pipeline document; tests override fields as needed. */
export function makeDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    specVersion: '1.0.0',
    name: 'Docs',
    on: { push: { branches: ['main'] } },
    steps: [
      { id: 'checkout', name: 'Check out', type: 'checkout', with: { fetchDepth: 0 } },
      {
        id: 'build',
        name: 'Build docs',
        type: 'shell',
        workingDirectory: 'docs',
        timeoutMinutes: 20,
        with: { run: 'make html' },
      },
      {
        id: 'publish',
        name: 'Publish',
        type: 'publish-branch',
        with: { branch: 'gh-pages', source: 'docs/_build', target: 'docs/api' },
      },
    ],
    ...overrides,
  };
}
