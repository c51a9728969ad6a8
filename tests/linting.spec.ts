/**
 * Tests for lint rules and LintRunner
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { InterpolatedLogsRule } from '../src/linting/InterpolatedLogsRule.js';
import { LintRunner } from '../src/linting/LintRunner.js';
import { RubySourceParser } from '../src/ruby/RubySourceParser.js';
import { SignalVisitor } from '../src/signal-detection/SignalVisitor.js';
import type { LogCall } from '../src/signal-detection/types.js';

const parser = new RubySourceParser();

async function firstLogCall(source: string): Promise<LogCall> {
  const outcome = await parser.visit(source, 'test.rb', root => new SignalVisitor('test.rb').visit(root));
  if (!outcome.success) throw new Error(outcome.failure.message);

  const [call] = outcome.value.logCalls;
  if (!call) throw new Error('No log call found');
  return call;
}

describe('InterpolatedLogsRule', () => {
  const rule = new InterpolatedLogsRule();

  it('should report interpolated messages with a structured suggestion', async () => {
    const call = await firstLogCall(`
class UserService
  def create(user)
    logger.info("User #{user.id} logged in")
  end
end
`);

    expect(rule.check(call, 'app/services/user_service.rb')).toEqual({
      rule: 'interpolated-logs',
      file: 'app/services/user_service.rb',
      line: 4,
      message: 'Log uses string interpolation',
      suggestion: 'logger.info("user_logged_in", user_id: user_id)',
      context: {
        original: '"User #{user.id} logged in"',
        staticMatch: 'User  logged in',
        interpolationCount: 1,
      },
    });
  });

  it('should list every interpolation in the suggestion', async () => {
    const call = await firstLogCall('logger.error("Order #{order.id} failed for user #{user.email}")\n');

    const issue = rule.check(call, 'test.rb');

    expect(issue?.suggestion).toBe('logger.error("order_failed_for_user", order_id: order_id, user_email: user_email)');
    expect(issue?.context.interpolationCount).toBe(2);
  });

  it('should suggest the level method for generic add calls', async () => {
    const call = await firstLogCall('logger.add(:warn, "Charging #{amount} cents")\n');

    expect(rule.check(call, 'test.rb')?.suggestion).toBe('logger.warn("charging_cents", amount: amount)');
  });

  it('should fall back to a generic event name', async () => {
    const call = await firstLogCall('logger.info("#{payload}")\n');

    expect(rule.check(call, 'test.rb')?.suggestion).toBe('logger.info("log_event", payload: payload)');
  });

  it('should report interpolated heredocs', async () => {
    const call = await firstLogCall('logger.info(<<~MSG)\n  Order #{id} shipped\nMSG\n');

    const issue = rule.check(call, 'test.rb');

    expect(issue?.suggestion).toBe('logger.info("order_shipped", id: id)');
    expect(issue?.context.interpolationCount).toBe(1);
  });

  it('should accept plain strings and symbols', async () => {
    expect(rule.check(await firstLogCall('logger.info("user_created")\n'), 'test.rb')).toBeNull();
    expect(rule.check(await firstLogCall('logger.info(:user_created)\n'), 'test.rb')).toBeNull();
  });
});

describe('LintRunner', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lint-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should lint every readable file and group issues by rule', async () => {
    const service = path.join(dir, 'service.rb');
    const broken = path.join(dir, 'broken.rb');
    await fs.writeFile(
      service,
      'class Service\n  def run(id)\n    logger.info("Started #{id}")\n    logger.info("finished")\n    Rails.logger.warn("Retry #{id}")\n  end\nend\n'
    );
    await fs.writeFile(broken, 'class Broken\n  logger.info("Oops #{x}")\n');

    const runner = new LintRunner({ parser });
    const issues = await runner.run([service, broken, path.join(dir, 'missing.rb')]);

    expect(issues.map(issue => [issue.file, issue.line])).toEqual([
      [service, 3],
      [service, 5],
    ]);
    expect([...runner.issuesByRule().keys()]).toEqual(['interpolated-logs']);
    expect(runner.issuesByRule().get('interpolated-logs')).toHaveLength(2);
  });

  it('should merge detection overrides over the defaults', async () => {
    const service = path.join(dir, 'audit.rb');
    await fs.writeFile(service, 'Audit.logger.info("Saved #{id}")\nLOGGER.warn("Dropped #{id}")\n');
    const runner = new LintRunner({ parser, detection: { logNamespaces: ['Audit'] } });

    const issues = await runner.run([service]);

    expect(issues.map(issue => issue.line)).toEqual([1, 2]);
  });

  it('should start each run from scratch', async () => {
    const service = path.join(dir, 'service.rb');
    await fs.writeFile(service, 'logger.info("Hello #{name}")\n');
    const runner = new LintRunner({ parser });

    await runner.run([service]);
    await runner.run([service]);

    expect(runner.issues).toHaveLength(1);
  });
});
