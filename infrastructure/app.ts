#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { FieldAdvisoryStack } from './field-advisory-stack';

const app = new cdk.App();

// Get environment configuration
const env = {
  account: process.env.CDK_DEFAULT_ACCOUNT,
  region: process.env.CDK_DEFAULT_REGION || 'us-east-1',
};

const stage = process.env.ENVIRONMENT || 'development';

new FieldAdvisoryStack(app, `FieldAdvisoryStack-${stage}`, {
  env,
  stage,
  sentinelHubClientId: process.env.SENTINEL_HUB_CLIENT_ID,
  sentinelHubClientSecret: process.env.SENTINEL_HUB_CLIENT_SECRET,
  description: 'Field health analysis and advisory engine',
  tags: {
    Project: 'FieldAdvisory',
    Environment: stage,
  },
});

app.synth();
