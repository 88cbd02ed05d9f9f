import { CredentialVault, ScopedCredential } from './credential-vault.js';
import { REPORT_HEADER } from './report.js';
import { ScriptedModelClient, hang } from './testing/fakes.js';
import { FAST_DISPATCH, createHarness, singleFileDiff } from './testing/harness.js';
import type { InstallationSettings, PullRequestDiff, PullRequestEvent } from './types.js';

const event: PullRequestEvent = {
  deliveryId: 'delivery-9',
  action: 'opened',
  installationId: 42,
  repoFullName: 'octo-org/app',
  prNumber: 7,
  prTitle: 'Add login',
  commitSha: 'abc1234def5678',
  ownerLogin: 'octo-org',
  ownerType: 'Organization',
};

const ALL_ON: InstallationSettings = { style: true, security: true, performance: true, logic: true, autoApprove: false };

const lowStyleIssue = () => ({
  kind: 'ok' as const,
  text: '[{"line_start": 3, "severity": "low", "title": "Trailing whitespace"}]',
});

async function prepare(h: ReturnType<typeof createHarness>, settings: Partial<InstallationSettings> = {}) {
  const installation = h.installations.seed({
    externalInstallationId: 42,
    encryptedApiKey: h.vault.encrypt('test-api-key'),
    settings: { ...ALL_ON, ...settings },
  });
  const review = await h.reviews.create({
    installationId: installation.id,
    repoFullName: event.repoFullName,
    prNumber: event.prNumber,
    prTitle: event.prTitle,
    commitSha: event.commitSha,
  });
  return { installation, review };
}

async function prepareWithoutKey(h: ReturnType<typeof createHarness>, settings: Partial<InstallationSettings> = {}) {
  const installation = h.installations.seed({ externalInstallationId: 42, settings: { ...ALL_ON, ...settings } });
  const review = await h.reviews.create({
    installationId: installation.id,
    repoFullName: event.repoFullName,
    prNumber: event.prNumber,
    prTitle: event.prTitle,
    commitSha: event.commitSha,
  });
  return { installation, review };
}

describe('ReviewPipeline', () => {
  it('asks for approval when auto-approve is on and only low findings remain', async () => {
    const h = createHarness({ model: new ScriptedModelClient({ 'style reviewer': lowStyleIssue }) });
    const { installation, review } = await prepare(h, { autoApprove: true });

    const outcome = await h.pipeline.run(event, installation, review);

    expect(outcome).toEqual({ reviewId: review.id, status: 'completed', issuesFound: 1, commentPublished: true });
    expect(h.publisher.jobs.map((j) => j.approve)).toEqual([true]);
  });

  it('does not approve when a medium finding is present', async () => {
    const model = new ScriptedModelClient({
      'logic reviewer': () => ({ kind: 'ok', text: '[{"line_start": 5, "severity": "medium", "title": "Missing await"}]' }),
    });
    const h = createHarness({ model });
    const { installation, review } = await prepare(h, { autoApprove: true });

    await h.pipeline.run(event, installation, review);

    expect(h.publisher.jobs.map((j) => j.approve)).toEqual([false]);
  });

  it('only calls the enabled agents', async () => {
    const h = createHarness();
    const { installation, review } = await prepare(h, { style: false, performance: false });

    await h.pipeline.run(event, installation, review);

    expect(h.model.calls.map((c) => c.role).sort()).toEqual(['logic reviewer', 'security reviewer']);
  });

  it('completes without a comment when every agent is disabled', async () => {
    const h = createHarness();
    const { installation, review } = await prepare(h, { style: false, security: false, performance: false, logic: false });

    const outcome = await h.pipeline.run(event, installation, review);

    expect(outcome).toEqual({ reviewId: review.id, status: 'completed', issuesFound: 0, commentPublished: false });
    expect(h.model.calls).toHaveLength(0);
    expect(h.publisher.jobs).toHaveLength(0);
    expect((await h.reviews.findById(review.id))?.status).toBe('completed');
  });

  it('completes without a comment when no file is reviewable', async () => {
    const h = createHarness({ diff: { files: [], text: '' } });
    const { installation, review } = await prepare(h);

    const outcome = await h.pipeline.run(event, installation, review);

    expect(outcome.status).toBe('completed');
    expect(await h.reviews.findById(review.id)).toMatchObject({ status: 'completed', filesReviewed: 0, issuesFound: 0 });
    expect(h.publisher.jobs).toHaveLength(0);
  });

  it('fails without a comment when the diff cannot be fetched', async () => {
    const h = createHarness({
      source: {
        fetchDiff: async () => {
          throw new Error('GitHub request failed: 404 Not Found');
        },
      },
    });
    const { installation, review } = await prepare(h);

    const outcome = await h.pipeline.run(event, installation, review);

    expect(outcome).toMatchObject({ status: 'failed', errorCode: 'DIFF_UNAVAILABLE', commentPublished: false });
    expect((await h.reviews.findById(review.id))?.errorMessage).toBe(
      'could not fetch pull request diff: GitHub request failed: 404 Not Found',
    );
    expect(h.model.calls).toHaveLength(0);
  });

  it('fails with a configuration comment when the key cannot be decrypted', async () => {
    const h = createHarness();
    const { installation, review } = await prepare(h);
    const foreign = CredentialVault.fromHex('2e'.repeat(32), h.installations);
    await h.installations.setEncryptedApiKey(42, foreign.encrypt('test-api-key'));

    const outcome = await h.pipeline.run(event, installation, review);

    expect(outcome).toMatchObject({ status: 'failed', errorCode: 'DECRYPTION_FAILED', commentPublished: true });
    expect(h.model.calls).toHaveLength(0);
    expect(h.publisher.jobs[0].body).toContain('could not be decrypted');
  });

  it('still publishes the report when the outcome cannot be recorded', async () => {
    const h = createHarness();
    const { installation, review } = await prepare(h);
    h.reviews.failFinalize = true;

    const outcome = await h.pipeline.run(event, installation, review);

    expect(outcome.commentPublished).toBe(true);
    expect(h.publisher.jobs).toHaveLength(1);
  });

  it('still records the outcome when the queue is down', async () => {
    const h = createHarness();
    const { installation, review } = await prepare(h);
    h.publisher.failWith = new Error('channel closed');

    const outcome = await h.pipeline.run(event, installation, review);

    expect(outcome).toEqual({ reviewId: review.id, status: 'completed', issuesFound: 0, commentPublished: false });
    expect((await h.reviews.findById(review.id))?.status).toBe('completed');
  });

  it('releases the credential when the run ends', async () => {
    const release = jest.spyOn(ScopedCredential.prototype, 'release');
    const h = createHarness();
    const { installation, review } = await prepare(h);

    await h.pipeline.run(event, installation, review);

    expect(h.model.calls).toHaveLength(4);
    expect(release).toHaveBeenCalledTimes(1);
    release.mockRestore();
  });

  describe('without a usable key', () => {
    it('fails with NOT_CONFIGURED when the diff is empty', async () => {
      const fetchDiff = jest.fn(async (): Promise<PullRequestDiff> => ({ files: [], text: '' }));
      const h = createHarness({ source: { fetchDiff } });
      const { installation, review } = await prepareWithoutKey(h);

      const outcome = await h.pipeline.run(event, installation, review);

      expect(outcome).toMatchObject({ status: 'failed', errorCode: 'NOT_CONFIGURED', commentPublished: true });
      expect((await h.reviews.findById(review.id))?.status).toBe('failed');
      expect(fetchDiff).not.toHaveBeenCalled();
    });

    it('fails with NOT_CONFIGURED when every agent is disabled', async () => {
      const h = createHarness();
      const { installation, review } = await prepareWithoutKey(h, {
        style: false,
        security: false,
        performance: false,
        logic: false,
      });

      const outcome = await h.pipeline.run(event, installation, review);

      expect(outcome).toMatchObject({ status: 'failed', errorCode: 'NOT_CONFIGURED' });
    });

    it('reports NOT_CONFIGURED rather than a diff failure', async () => {
      const h = createHarness({
        source: {
          fetchDiff: async () => {
            throw new Error('GitHub request failed: 502 Bad Gateway');
          },
        },
      });
      const { installation, review } = await prepareWithoutKey(h);

      const outcome = await h.pipeline.run(event, installation, review);

      expect(outcome).toMatchObject({ status: 'failed', errorCode: 'NOT_CONFIGURED' });
      expect((await h.reviews.findById(review.id))?.errorMessage).toBe(
        'No model API key is configured for this installation. Add one in the review app settings to enable reviews.',
      );
    });
  });

  describe('run deadline', () => {
    it('fails the review when the diff fetch never settles', async () => {
      let seen: AbortSignal | undefined;
      const h = createHarness({
        dispatch: { ...FAST_DISPATCH, deadlineMs: 50 },
        source: {
          fetchDiff: (_repo, _pr, signal) => {
            seen = signal;
            return new Promise<PullRequestDiff>(() => undefined);
          },
        },
      });
      const { installation, review } = await prepare(h);
      const startedAt = Date.now();

      const outcome = await h.pipeline.run(event, installation, review);

      expect(Date.now() - startedAt).toBeLessThan(1_000);
      expect(outcome).toEqual({
        reviewId: review.id,
        status: 'failed',
        issuesFound: 0,
        errorCode: 'RUN_DEADLINE',
        commentPublished: false,
      });
      expect(await h.reviews.findById(review.id)).toMatchObject({
        status: 'failed',
        errorMessage: 'run deadline of 50ms reached during diff fetch',
      });
      expect(seen?.aborted).toBe(true);
      expect(h.model.calls).toHaveLength(0);
    });

    it('gives the agents only what the diff fetch left of the budget', async () => {
      const h = createHarness({
        model: new ScriptedModelClient({ 'performance reviewer': hang }),
        dispatch: { ...FAST_DISPATCH, callTimeoutMs: 1_000 },
        runDeadlineMs: 100,
        source: {
          fetchDiff: () => new Promise<PullRequestDiff>((resolve) => setTimeout(() => resolve(singleFileDiff), 40)),
        },
      });
      const { installation, review } = await prepare(h);
      const startedAt = Date.now();

      const outcome = await h.pipeline.run(event, installation, review);

      expect(Date.now() - startedAt).toBeLessThan(500);
      expect(outcome.status).toBe('completed');
      expect(h.publisher.jobs.map((j) => j.body)).toEqual([
        `${REPORT_HEADER}\n\nReviewed 1 file with the security, logic and style agents and found no issues.\n`,
      ]);
    });
  });
});
