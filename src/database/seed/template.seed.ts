import { PipelineStage } from '../../engine';
import { PipelineTemplateEntity } from '../entities/pipeline-template.entity';

export type TemplateSeed = Pick<PipelineTemplateEntity, 'name' | 'description' | 'steps'>;

/**
 * Default templates inserted on first app start when no templates exist.
 */
export const TEMPLATE_SEED: TemplateSeed[] = [
  {
    name: 'Standard CI/CD Pipeline',
    description: 'Standard pipeline for building, testing, and deploying AI apps',
    steps: [
      {
        name: 'Checkout Code',
        stage: PipelineStage.SOURCE,
        commandTemplate: 'git checkout ${BRANCH} && git pull',
        dependsOn: [],
      },
      {
        name: 'Install Dependencies',
        stage: PipelineStage.BUILD,
        commandTemplate: 'pip install -r requirements.txt',
        dependsOn: ['Checkout Code'],
      },
      {
        name: 'Run Tests',
        stage: PipelineStage.TEST,
        commandTemplate: 'pytest tests/ -v',
        dependsOn: ['Install Dependencies'],
      },
      {
        name: 'Build Package',
        stage: PipelineStage.BUILD,
        commandTemplate: 'python setup.py bdist_wheel',
        dependsOn: ['Run Tests'],
      },
      {
        name: 'Deploy to Staging',
        stage: PipelineStage.DEPLOY,
        commandTemplate: 'deploy_to_staging.sh ${APP_ID} ${VERSION}',
        dependsOn: ['Build Package'],
      },
      {
        name: 'Verify Deployment',
        stage: PipelineStage.VERIFY,
        commandTemplate: 'verify_deployment.sh ${APP_ID} ${VERSION} staging',
        dependsOn: ['Deploy to Staging'],
      },
    ],
  },
  {
    name: 'Microservice CI/CD Pipeline',
    description: 'Pipeline for building and deploying microservice-based AI apps',
    steps: [
      {
        name: 'Checkout Code',
        stage: PipelineStage.SOURCE,
        commandTemplate: 'git checkout ${BRANCH} && git pull',
        dependsOn: [],
      },
      {
        name: 'Build Docker Image',
        stage: PipelineStage.BUILD,
        commandTemplate: 'docker build -t ${APP_ID}:${VERSION} .',
        dependsOn: ['Checkout Code'],
      },
      {
        name: 'Run Tests',
        stage: PipelineStage.TEST,
        commandTemplate: 'docker run --rm ${APP_ID}:${VERSION} pytest -v',
        dependsOn: ['Build Docker Image'],
      },
      {
        name: 'Push Docker Image',
        stage: PipelineStage.BUILD,
        commandTemplate: 'docker push ${DOCKER_REGISTRY}/${APP_ID}:${VERSION}',
        dependsOn: ['Run Tests'],
      },
      {
        name: 'Deploy to Kubernetes',
        stage: PipelineStage.DEPLOY,
        commandTemplate: 'kubectl apply -f kubernetes/${ENV}/deployment.yaml',
        dependsOn: ['Push Docker Image'],
      },
      {
        name: 'Verify Deployment',
        stage: PipelineStage.VERIFY,
        commandTemplate: 'verify_k8s_deployment.sh ${APP_ID} ${VERSION} ${ENV}',
        dependsOn: ['Deploy to Kubernetes'],
      },
    ],
  },
];
