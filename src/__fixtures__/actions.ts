import {
  Artifact,
  CacheStep,
  Expression,
  Job,
  Null,
  On,
  RunStep,
  Schedule,
  UsesStep,
  Workflow,
  defineWorkflows
} from '../index.js';

const coverage = new Artifact({ name: 'coverage', path: 'coverage/' });

class Ci extends Workflow {
  constructor() {
    super('ci', 'CI', {
      concurrencyGroup: 'ci-${{ github.ref }}',
      cancelInProgress: true,
      permissions: { contents: 'read' }
    });
    this.on({
      push: new On({ branches: ['main'] }),
      pullRequest: new On({ paths: ['src/**', 'package.json'] }),
      workflowDispatch: new Null()
    });
    this.addJob(
      'test',
      new Job({
        name: `Test (Node ${new Expression('matrix.node')})`,
        matrix: { node: [20, 22] },
        failFast: false,
        steps: [
          new UsesStep('actions/setup-node@v4', { with: { 'node-version': `${new Expression('matrix.node')}` } }),
          CacheStep.simple('Cache npm', '~/.npm', 'npm', ['package-lock.json']),
          new RunStep('npm ci\nnpm test', { name: 'Test', env: { CI: new Expression('github.actions') } }),
          coverage.asUpload({ ifNoFilesFound: 'ignore' })
        ]
      })
    );
    this.addJob(
      'report',
      new Job({
        needs: 'test',
        defaultCheckout: false,
        steps: [coverage.asDownload(), new RunStep('ls coverage')]
      })
    );
  }
}

class Nightly extends Workflow {
  constructor() {
    super('nightly', 'Nightly');
    this.on({ schedule: new Schedule(['0 3 * * *']) });
    this.addJob('audit', new Job({ steps: [new RunStep('npm audit', { continueOnError: true })] }));
  }
}

export default defineWorkflows(Nightly, Ci);
