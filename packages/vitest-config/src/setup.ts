import nock from 'nock';

// Tests never reach a real origin.
nock.disableNetConnect();
