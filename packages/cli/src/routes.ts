import {
  HttpResponse,
  JsonSyntaxError,
  parseJson,
  type RouteHandler,
  Router,
  type RouterOptions,
} from "@strand/engine";

const echoParams: RouteHandler = (_request, params) =>
  HttpResponse.data(params);

const echoBody: RouteHandler = (request) => {
  try {
    return HttpResponse.json(parseJson(request.body));
  } catch (err) {
    if (err instanceof JsonSyntaxError) {
      return HttpResponse.text(err.message, 400);
    }
    throw err;
  }
};

export function createSampleRouter(options: RouterOptions = {}): Router {
  return new Router(options)
    .get("/", echoParams)
    .get("/sample", echoParams)
    .get("/schools/:id/classes", echoParams)
    .get("/schools/:id/:score/classes/:disco", echoParams)
    .post("/echo", echoBody);
}
